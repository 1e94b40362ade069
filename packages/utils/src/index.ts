import { randomUUID } from "node:crypto";

/**
 * Generates a UUID v4 string.
 */
export function uuid(): string {
  return randomUUID();
}

/**
 * Short prefixed id for editor entities, e.g. `circle_1f3a9c0e7b24`.
 */
export function createId(prefix: string): string {
  return `${prefix}_${uuid().replace(/-/g, "").slice(0, 12)}`;
}
