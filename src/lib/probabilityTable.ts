import defaultConfig from "./config";
import {
  InvalidProbabilityValueError,
  MissingOutcomeError,
  ZeroTotalProbabilityError,
} from "./errors";
import type { Outcome, Row } from "./outcome";

export type TableKey = Outcome | Row;

export type Weights<K extends TableKey> = Iterable<readonly [K, number]>;

function serializeKey(key: TableKey): string {
  return JSON.stringify(key);
}

function isValidProbability(value: number): boolean {
  return value >= 0 && value <= 1;
}

/**
 * A normalized discrete distribution. Instances are immutable: every
 * constructor goes through `normalize`, so the values always lie in [0,1]
 * and sum to 1 within the configured tolerance.
 *
 * Iteration follows insertion order of the weights it was built from.
 */
export class ProbabilityTable<K extends TableKey = Outcome> {
  private readonly table: Map<string, readonly [K, number]>;

  private constructor(table: Map<string, readonly [K, number]>) {
    this.table = table;
  }

  /**
   * Divides every weight by the total weight. Repeated keys keep the last
   * weight supplied.
   */
  static normalize<K extends TableKey>(
    weights: Weights<K>,
    tolerance: number = defaultConfig.tolerance,
  ): ProbabilityTable<K> {
    const raw = new Map<string, readonly [K, number]>();
    for (const [key, weight] of weights) {
      if (!Number.isFinite(weight) || weight < 0) {
        throw new InvalidProbabilityValueError(weight);
      }
      raw.set(serializeKey(key), [key, weight]);
    }

    let total = 0;
    for (const [, weight] of raw.values()) {
      total += weight;
    }
    if (total === 0) {
      throw new ZeroTotalProbabilityError();
    }

    const table = new Map<string, readonly [K, number]>();
    let sum = 0;
    for (const [serialized, [key, weight]] of raw) {
      const probability = weight / total;
      if (!isValidProbability(probability)) {
        throw new InvalidProbabilityValueError(probability);
      }
      sum += probability;
      table.set(serialized, [key, probability]);
    }

    if (Math.abs(sum - 1) > tolerance) {
      throw new InvalidProbabilityValueError(sum);
    }

    return new ProbabilityTable(table);
  }

  /** `{ true: p, false: 1 - p }` */
  static binary(
    p: number,
    tolerance: number = defaultConfig.tolerance,
  ): ProbabilityTable<boolean> {
    if (!isValidProbability(p)) {
      throw new InvalidProbabilityValueError(p);
    }
    return ProbabilityTable.normalize<boolean>(
      [
        [true, p],
        [false, 1 - p],
      ],
      tolerance,
    );
  }

  static fromRecord(
    record: Record<string, number>,
    tolerance: number = defaultConfig.tolerance,
  ): ProbabilityTable<string> {
    return ProbabilityTable.normalize(Object.entries(record), tolerance);
  }

  get size(): number {
    return this.table.size;
  }

  has(key: K): boolean {
    return this.table.has(serializeKey(key));
  }

  get(key: K): number | undefined {
    return this.table.get(serializeKey(key))?.[1];
  }

  probability(key: K): number {
    const entry = this.table.get(serializeKey(key));
    if (!entry) {
      throw new MissingOutcomeError(serializeKey(key));
    }
    return entry[1];
  }

  outcomes(): K[] {
    return Array.from(this.table.values(), ([key]) => key);
  }

  entries(): Array<readonly [K, number]> {
    return Array.from(this.table.values());
  }

  [Symbol.iterator](): IterableIterator<readonly [K, number]> {
    return this.table.values();
  }

  /**
   * Plain-object view for display. Row keys are comma-joined; if two keys
   * would share a label, every key is written in its serialized form.
   */
  toRecord(): Record<string, number> {
    const entries = Array.from(this.table.entries());
    const labels = entries.map(([, [key]]) =>
      Array.isArray(key) ? key.join(",") : String(key),
    );
    const distinct = new Set(labels).size === labels.length;

    const record: Record<string, number> = {};
    entries.forEach(([serialized, [, probability]], i) => {
      record[distinct ? labels[i] : serialized] = probability;
    });
    return record;
  }
}
