import type { Network } from "./network";
import { serializeRow, type Outcome, type Row } from "./outcome";
import type { Variable } from "./variable";

export type ValidationResult = { valid: true } | { valid: false; error: string };

export function expandParentRows(parents: readonly Variable[]): Row[] {
  let rows: Outcome[][] = [[]];
  for (const parent of parents) {
    const next: Outcome[][] = [];
    for (const row of rows) {
      for (const value of parent.domain) {
        next.push([...row, value]);
      }
    }
    rows = next;
  }
  return rows;
}

function preview(rows: Row[]): string {
  return `${rows.slice(0, 3).map(serializeRow).join(", ")}${rows.length > 3 ? "..." : ""}`;
}

/**
 * Checks that a variable's CPT has exactly the rows its parents' domains can
 * produce. Lookups never default, so an uncovered row would otherwise only
 * surface as a failure halfway through a query.
 */
export function validateConditionalTable(variable: Variable): ValidationResult {
  const expected = expandParentRows(variable.parents);
  const uncovered = expected.filter((row) => !variable.table.has(row));

  if (uncovered.length > 0) {
    return {
      valid: false,
      error: `CPT for ${variable.name} is incomplete: ${uncovered.length} of ${expected.length} combinations not covered. Missing: ${preview(uncovered)}`,
    };
  }

  const expectedKeys = new Set(expected.map(serializeRow));
  const unreachable = variable.table
    .rows()
    .filter((row) => !expectedKeys.has(serializeRow(row)));

  if (unreachable.length > 0) {
    return {
      valid: false,
      error: `CPT for ${variable.name} has ${unreachable.length} rows with values outside its parents' domains: ${preview(unreachable)}`,
    };
  }

  return { valid: true };
}

export function validateNetwork(network: Network): ValidationResult {
  for (const variable of network.variables) {
    const result = validateConditionalTable(variable);
    if (!result.valid) return result;
  }
  return { valid: true };
}
