// ============================================
// Output Contract
// ============================================

import type { OutputField } from "@phaseflow/shared";

import type { WorkerOutcome } from "./types.js";

/**
 * Problems with the fields an outcome produced, measured against the
 * worker's declared output contract. An empty contract accepts anything.
 *
 * - A `Success` must produce every declared field.
 * - No outcome may produce a field the contract does not declare.
 *
 * @example
 * ```typescript
 * outputContractViolations([{ field: "findings" }], {
 *   status: "Success",
 *   producedFields: { other: 1 },
 *   diagnostics: {},
 * });
 * // ['missing declared field "findings"', 'undeclared field "other"']
 * ```
 */
export function outputContractViolations(
  contract: readonly OutputField[],
  outcome: Pick<WorkerOutcome, "status" | "producedFields">
): string[] {
  if (contract.length === 0) return [];

  const declared = new Set(contract.map((output) => output.field));
  const produced = Object.keys(outcome.producedFields);
  const violations: string[] = [];

  if (outcome.status === "Success") {
    for (const field of declared) {
      if (!Object.hasOwn(outcome.producedFields, field)) {
        violations.push(`missing declared field "${field}"`);
      }
    }
  }
  for (const field of produced) {
    if (!declared.has(field)) {
      violations.push(`undeclared field "${field}"`);
    }
  }

  return violations;
}
