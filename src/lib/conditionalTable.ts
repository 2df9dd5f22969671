import defaultConfig from "./config";
import {
  InvalidConditionalTableError,
  MissingConditionalRowError,
} from "./errors";
import { isRow, serializeRow, type Outcome, type Row } from "./outcome";
import { ProbabilityTable } from "./probabilityTable";

/**
 * A single distribution as written by an author: a scalar `p` (binary
 * shorthand for `{ true: p, false: 1 - p }`), outcome weights, or an already
 * built table.
 */
export type DistributionSpec =
  | number
  | ProbabilityTable<Outcome>
  | Map<Outcome, number>
  | Record<string, number>;

/** A bare outcome is accepted in place of a one-tuple. */
export type RowKey = Outcome | Row;

export type RowEntry = readonly [RowKey, DistributionSpec];

/**
 * Everything `Network.add` accepts as a CPT:
 * - zero parents: a bare distribution;
 * - one or more parents: a Map or list of `[row, distribution]` entries, or a
 *   record keyed by the string form of a single parent's outcomes.
 */
export type CptSpec =
  | DistributionSpec
  | Map<RowKey, DistributionSpec>
  | ReadonlyArray<RowEntry>
  | Record<string, DistributionSpec>;

function isEntryList(spec: CptSpec): spec is ReadonlyArray<RowEntry> {
  return Array.isArray(spec);
}

/** The one-parent shorthand keyed by the parent's outcome as a string. */
export function isRowRecord(
  spec: CptSpec,
): spec is Record<string, DistributionSpec> {
  return (
    typeof spec === "object" &&
    !isEntryList(spec) &&
    !(spec instanceof Map) &&
    !(spec instanceof ProbabilityTable)
  );
}

function toDistribution(
  spec: CptSpec,
  tolerance: number,
): ProbabilityTable<Outcome> {
  if (typeof spec === "number") {
    return ProbabilityTable.binary(spec, tolerance);
  }
  if (spec instanceof ProbabilityTable) {
    return spec;
  }
  if (isEntryList(spec)) {
    throw new InvalidConditionalTableError(
      "Expected a distribution, got a list of CPT rows",
    );
  }

  const weights: Array<readonly [Outcome, number]> = [];
  const source = spec instanceof Map ? spec : Object.entries(spec);
  for (const [outcome, weight] of source) {
    if (isRow(outcome) || typeof weight !== "number") {
      throw new InvalidConditionalTableError(
        "Distribution must map outcomes to numeric weights",
      );
    }
    weights.push([outcome, weight]);
  }
  return ProbabilityTable.normalize(weights, tolerance);
}

function toRowEntries(spec: CptSpec): RowEntry[] {
  if (isEntryList(spec)) {
    return [...spec];
  }
  if (typeof spec === "number" || spec instanceof ProbabilityTable) {
    throw new InvalidConditionalTableError(
      "A variable with parents needs one CPT row per parent combination",
    );
  }

  const entries: RowEntry[] = [];
  const source = spec instanceof Map ? spec : Object.entries(spec);
  for (const [key, distribution] of source) {
    entries.push([key, distribution]);
  }
  return entries;
}

/**
 * Parent-value row → distribution over the variable's own outcomes. Rows are
 * matched exactly; nothing is interpolated or defaulted.
 */
export class ConditionalTable {
  readonly parentCount: number;
  private readonly table: Map<string, readonly [Row, ProbabilityTable<Outcome>]>;

  private constructor(
    parentCount: number,
    table: Map<string, readonly [Row, ProbabilityTable<Outcome>]>,
  ) {
    this.parentCount = parentCount;
    this.table = table;
  }

  static fromRows(
    rows: Iterable<readonly [Row, ProbabilityTable<Outcome>]>,
    parentCount: number,
  ): ConditionalTable {
    const table = new Map<string, readonly [Row, ProbabilityTable<Outcome>]>();
    for (const [row, distribution] of rows) {
      if (row.length !== parentCount) {
        throw new InvalidConditionalTableError(
          `CPT row ${serializeRow(row)} has ${row.length} values, expected ${parentCount}`,
        );
      }
      // Repeated rows: last one wins.
      table.set(serializeRow(row), [[...row], distribution]);
    }
    if (table.size === 0) {
      throw new InvalidConditionalTableError("CPT entries cannot be empty");
    }
    return new ConditionalTable(parentCount, table);
  }

  static fromSpec(
    spec: CptSpec,
    parentCount: number,
    tolerance: number = defaultConfig.tolerance,
  ): ConditionalTable {
    if (parentCount === 0 && !isEntryList(spec)) {
      return ConditionalTable.fromRows(
        [[[], toDistribution(spec, tolerance)]],
        0,
      );
    }

    const rows = toRowEntries(spec).map(
      ([key, distribution]): readonly [Row, ProbabilityTable<Outcome>] => [
        isRow(key) ? key : [key],
        toDistribution(distribution, tolerance),
      ],
    );
    return ConditionalTable.fromRows(rows, parentCount);
  }

  get size(): number {
    return this.table.size;
  }

  has(row: Row): boolean {
    return this.table.has(serializeRow(row));
  }

  lookup(row: Row): ProbabilityTable<Outcome> {
    const entry = this.table.get(serializeRow(row));
    if (!entry) {
      throw new MissingConditionalRowError(serializeRow(row));
    }
    return entry[1];
  }

  rows(): Row[] {
    return Array.from(this.table.values(), ([row]) => row);
  }

  distributions(): ProbabilityTable<Outcome>[] {
    return Array.from(this.table.values(), ([, distribution]) => distribution);
  }
}
