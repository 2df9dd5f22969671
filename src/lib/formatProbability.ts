import type { ProbabilityTable, TableKey } from "./probabilityTable";

export function formatProbability(
  probability: number,
  sigFigs: number = 4,
): string {
  if (probability === 0) return "0";
  if (probability === 1) return "1";

  // Round-tripping through Number drops toPrecision's padding zeros.
  return Number(probability.toPrecision(sigFigs)).toString();
}

export function formatProbabilityAsPercentage(
  probability: number,
  sigFigs: number = 2,
): string {
  return `${formatProbability(probability * 100, sigFigs)}%`;
}

/** One `outcome: probability` line per entry, outcomes left-aligned. */
export function formatDistribution<K extends TableKey>(
  distribution: ProbabilityTable<K>,
  sigFigs?: number,
): string {
  const record = distribution.toRecord();
  const width = Math.max(...Object.keys(record).map((label) => label.length));
  return Object.entries(record)
    .map(
      ([label, probability]) =>
        `${label.padEnd(width)}  ${formatProbability(probability, sigFigs)}`,
    )
    .join("\n");
}
