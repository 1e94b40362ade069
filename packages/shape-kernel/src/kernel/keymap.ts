import type { InputModifiers, ToolType } from "../tools/Tool.js";

export type EditorCommand =
  | "ROTATE.CW"
  | "ROTATE.CCW"
  | "EDIT.DELETE"
  | "TOOL.COMMIT"
  | "TOOL.CANCEL"
  | "UI.TOOL";

export type KeyBinding = {
  key: string;
  command: EditorCommand;
  tool?: ToolType;
};

export const DEFAULT_KEYMAP: readonly KeyBinding[] = [
  { key: "R", command: "ROTATE.CW" },
  { key: "E", command: "ROTATE.CCW" },
  { key: "Delete", command: "EDIT.DELETE" },
  { key: "Backspace", command: "EDIT.DELETE" },
  { key: "Enter", command: "TOOL.COMMIT" },
  { key: "Escape", command: "TOOL.CANCEL" },

  { key: "C", command: "UI.TOOL", tool: "circle" },
  { key: "T", command: "UI.TOOL", tool: "rectangle" },
  { key: "P", command: "UI.TOOL", tool: "path" }
];

const NAMED_KEYS = new Set(["Escape", "Enter", "Delete", "Backspace"]);

function normalizeMainKey(key: string): string | null {
  if (key.length === 1) return key.toUpperCase();
  if (NAMED_KEYS.has(key)) return key;
  return null;
}

/** `Mod+Shift+Alt+<key>`, where Mod stands for either Ctrl or Meta. */
export function normalizeShortcutKey(key: string, modifiers: InputModifiers): string | null {
  if (!key) return null;

  const parts: string[] = [];
  if (modifiers.ctrl || modifiers.meta) parts.push("Mod");
  if (modifiers.shift) parts.push("Shift");
  if (modifiers.alt) parts.push("Alt");

  const main = normalizeMainKey(key);
  if (!main) return null;
  parts.push(main);
  return parts.join("+");
}

export function matchShortcut(
  keymap: readonly KeyBinding[],
  key: string,
  modifiers: InputModifiers,
): KeyBinding | null {
  const normalized = normalizeShortcutKey(key, modifiers);
  if (!normalized) return null;
  for (const binding of keymap) {
    if (binding.key === normalized) return binding;
  }
  return null;
}
