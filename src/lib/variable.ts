import type { ConditionalTable } from "./conditionalTable";
import { MissingParentValueError } from "./errors";
import { serializeOutcome, type Outcome } from "./outcome";
import type { ProbabilityTable } from "./probabilityTable";

export type Assignment = ReadonlyMap<Variable, Outcome>;

/**
 * A node of a network. Created by `Network.add`; `index` is its position in
 * the owning network's canonical order and serves as its stable handle.
 */
export class Variable {
  readonly domain: readonly Outcome[];

  constructor(
    readonly name: string,
    readonly index: number,
    readonly parents: readonly Variable[],
    readonly table: ConditionalTable,
  ) {
    this.domain = collectDomain(table);
  }

  /**
   * The CPT row selected by the parents' values in `assignment`. Values for
   * non-parents are ignored.
   */
  conditional(assignment: Assignment): ProbabilityTable<Outcome> {
    const row = this.parents.map((parent) => {
      const value = assignment.get(parent);
      if (value === undefined) {
        throw new MissingParentValueError(this.name, parent.name);
      }
      return value;
    });
    return this.table.lookup(row);
  }

  /** P(this = value | parents as in assignment) */
  probabilityOf(value: Outcome, assignment: Assignment): number {
    return this.conditional(assignment).probability(value);
  }

  toString(): string {
    return this.name;
  }
}

function collectDomain(table: ConditionalTable): Outcome[] {
  const seen = new Map<string, Outcome>();
  for (const distribution of table.distributions()) {
    for (const outcome of distribution.outcomes()) {
      const key = serializeOutcome(outcome);
      if (!seen.has(key)) seen.set(key, outcome);
    }
  }
  return Array.from(seen.values());
}
