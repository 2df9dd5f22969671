export type Outcome = boolean | string | number;

export type Row = readonly Outcome[];

// Keys keep the JS type, so `true` and "true" never collide.
export function serializeOutcome(outcome: Outcome): string {
  return JSON.stringify(outcome);
}

export function serializeRow(row: Row): string {
  return JSON.stringify(row);
}

export function isRow(key: Outcome | Row): key is Row {
  return Array.isArray(key);
}
