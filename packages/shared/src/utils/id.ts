import { randomUUID } from "node:crypto";

/**
 * Generate a unique ID using crypto.randomUUID(), optionally prefixed
 * (e.g. `run-2f1c...`).
 */
export function createId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}-${id}` : id;
}
