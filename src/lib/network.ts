import defaultConfig from "./config";
import {
  ConditionalTable,
  isRowRecord,
  type CptSpec,
  type DistributionSpec,
  type RowEntry,
} from "./conditionalTable";
import {
  DuplicateVariableError,
  InvalidConditionalTableError,
  UnknownVariableError,
  VariableNotInNetworkError,
} from "./errors";
import type { Outcome } from "./outcome";
import { Variable } from "./variable";

export type Evidence = ReadonlyMap<Variable, Outcome>;

// Record keys are always strings; map each one onto the parent's outcome with
// the same string form so boolean and numeric parents match at lookup.
function resolveRecordKeys(
  name: string,
  parent: Variable,
  cpt: Record<string, DistributionSpec>,
): RowEntry[] {
  return Object.entries(cpt).map(([key, distribution]): RowEntry => {
    const outcome = parent.domain.find((value) => String(value) === key);
    if (outcome === undefined) {
      throw new InvalidConditionalTableError(
        `CPT row ${key} for ${name} matches no outcome of ${parent.name}`,
      );
    }
    return [outcome, distribution];
  });
}

export interface NetworkOptions {
  name?: string;
  tolerance?: number;
}

/**
 * Append-only collection of variables in parent-before-child order. The
 * order of `add` calls is the canonical order used for joint rows.
 *
 * Only the "parent already added" rule is checked; the caller supplies a
 * valid topological order.
 */
export class Network {
  readonly name: string;
  private readonly tolerance: number;
  private readonly ordered: Variable[] = [];
  private readonly byName = new Map<string, Variable>();

  constructor(options: NetworkOptions = {}) {
    this.name = options.name ?? "network";
    this.tolerance = options.tolerance ?? defaultConfig.tolerance;
  }

  get variables(): readonly Variable[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }

  add(name: string, parentNames: readonly string[], cpt: CptSpec): this {
    if (this.byName.has(name)) {
      throw new DuplicateVariableError(name);
    }
    const parents = parentNames.map((parentName) => this.lookup(parentName));
    const spec =
      parents.length === 1 && isRowRecord(cpt)
        ? resolveRecordKeys(name, parents[0], cpt)
        : cpt;
    const table = ConditionalTable.fromSpec(spec, parents.length, this.tolerance);
    const variable = new Variable(name, this.ordered.length, parents, table);

    this.ordered.push(variable);
    this.byName.set(name, variable);
    return this;
  }

  lookup(name: string): Variable {
    const variable = this.byName.get(name);
    if (!variable) {
      throw new UnknownVariableError(name);
    }
    return variable;
  }

  has(variable: Variable): boolean {
    return this.ordered[variable.index] === variable;
  }

  variableIndex(variable: Variable): number {
    if (!this.has(variable)) {
      throw new VariableNotInNetworkError(variable.name);
    }
    return variable.index;
  }

  /** Evidence keyed by variable from `{ name: outcome }`. */
  evidence(observed: Record<string, Outcome>): Evidence {
    const evidence = new Map<Variable, Outcome>();
    for (const [name, value] of Object.entries(observed)) {
      evidence.set(this.lookup(name), value);
    }
    return evidence;
  }
}
