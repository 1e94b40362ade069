import test from "node:test";
import assert from "node:assert/strict";
import { ZodError } from "zod";
import { DEFAULT_EDITOR_CONFIG, resolveEditorConfig } from "../src/kernel/config.js";
import { DEFAULT_KEYMAP, matchShortcut, normalizeShortcutKey } from "../src/kernel/keymap.js";
import { ShapeEditor } from "../src/kernel/ShapeEditor.js";
import { MemoryDocument } from "../src/file/document.js";

const none = { shift: false, alt: false, ctrl: false, meta: false };

test("resolveEditorConfig returns the defaults without overrides", () => {
  const config = resolveEditorConfig();
  assert.equal(config.rotationStepDeg, 15);
  assert.equal(config.wheelScaleFactor, 1.1);
  assert.deepEqual(config.defaultStyle, { outlineColor: "#000000", fillColor: "#ffffff", filled: false, strokeWidth: 2 });
  assert.equal(config.keymap, DEFAULT_EDITOR_CONFIG.keymap);
});

test("resolveEditorConfig merges a partial default style", () => {
  const config = resolveEditorConfig({ rotationStepDeg: 30, defaultStyle: { fillColor: "#ABCDEF", filled: true } });
  assert.equal(config.rotationStepDeg, 30);
  assert.deepEqual(config.defaultStyle, { outlineColor: "#000000", fillColor: "#abcdef", filled: true, strokeWidth: 2 });
});

test("resolveEditorConfig rejects values the editor cannot use", () => {
  assert.throws(() => resolveEditorConfig({ wheelScaleFactor: 0.5 }), ZodError);
  assert.throws(() => resolveEditorConfig({ rotationStepDeg: 0 }), ZodError);
  assert.throws(() => resolveEditorConfig({ defaultStyle: { strokeWidth: 1.5 } }), ZodError);
});

test("normalizeShortcutKey folds Ctrl and Meta into Mod", () => {
  assert.equal(normalizeShortcutKey("z", { ...none, ctrl: true, shift: true }), "Mod+Shift+Z");
  assert.equal(normalizeShortcutKey("z", { ...none, meta: true }), "Mod+Z");
  assert.equal(normalizeShortcutKey("Escape", none), "Escape");
  assert.equal(normalizeShortcutKey("ArrowUp", none), null);
  assert.equal(normalizeShortcutKey("", none), null);
});

test("the default keymap binds the editor commands", () => {
  assert.equal(matchShortcut(DEFAULT_KEYMAP, "r", none)?.command, "ROTATE.CW");
  assert.equal(matchShortcut(DEFAULT_KEYMAP, "e", none)?.command, "ROTATE.CCW");
  assert.equal(matchShortcut(DEFAULT_KEYMAP, "Backspace", none)?.command, "EDIT.DELETE");
  assert.deepEqual(matchShortcut(DEFAULT_KEYMAP, "t", none), { key: "T", command: "UI.TOOL", tool: "rectangle" });
  assert.equal(matchShortcut(DEFAULT_KEYMAP, "r", { ...none, ctrl: true }), null);
  assert.equal(matchShortcut(DEFAULT_KEYMAP, "F1", none), null);
});

test("ShapeEditor honours a configured rotation step and keymap", () => {
  const editor = new ShapeEditor({
    rotationStepDeg: 90,
    keymap: [{ key: "Shift+R", command: "ROTATE.CW" }]
  });
  editor.load(
    new MemoryDocument(
      JSON.stringify([
        { type: "RECTANGLE", params: [0, 0, 20, 2], outlineColor: "#000000", fillColor: "#ffffff", filled: false, strokeWidth: 2 }
      ]),
    ),
  );
  editor.handlePointerEvent({
    type: "pointerdown",
    pointerId: 1,
    buttons: 1,
    position: { x: 10, y: 1 },
    modifiers: none,
    timestamp: 1
  });

  assert.equal(editor.handleKeyDown({ key: "r", modifiers: none, timestamp: 2 }), false);
  assert.equal(editor.handleKeyDown({ key: "R", modifiers: { ...none, shift: true }, timestamp: 3 }), true);

  const bounds = editor.getSelectionBounds();
  assert.ok(bounds);
  assert.ok(Math.abs(bounds.x - 9) < 1e-9);
  assert.ok(Math.abs(bounds.y + 9) < 1e-9);
  assert.ok(Math.abs(bounds.width - 2) < 1e-9);
  assert.ok(Math.abs(bounds.height - 20) < 1e-9);
});
