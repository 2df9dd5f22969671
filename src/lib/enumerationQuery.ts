import { resolveConfig, type InferenceConfig } from "./config";
import { jointDistribution } from "./jointDistribution";
import type { Evidence, Network } from "./network";
import { serializeOutcome, type Outcome } from "./outcome";
import { ProbabilityTable } from "./probabilityTable";
import type { Variable } from "./variable";

/**
 * Posterior P(query | evidence) by summing the joint rows that agree with the
 * evidence and normalizing over the query's domain.
 *
 * Evidence that no row with positive probability satisfies raises
 * `ZeroTotalProbabilityError`.
 */
export function ask(
  query: Variable,
  evidence: Evidence,
  network: Network,
  options: Partial<InferenceConfig> = {},
): ProbabilityTable<Outcome> {
  const queryIndex = network.variableIndex(query);
  const observed = Array.from(
    evidence,
    ([variable, value]) => [network.variableIndex(variable), value] as const,
  );

  const joint = jointDistribution(network, options);

  const totals = new Map<string, [Outcome, number]>();
  for (const outcome of query.domain) {
    totals.set(serializeOutcome(outcome), [outcome, 0]);
  }

  for (const [row, probability] of joint) {
    if (!observed.every(([index, value]) => row[index] === value)) continue;

    const total = totals.get(serializeOutcome(row[queryIndex]));
    if (total) total[1] += probability;
  }

  return ProbabilityTable.normalize(
    totals.values(),
    resolveConfig(options).tolerance,
  );
}

/** Posterior of every variable in network order. */
export function marginals(
  network: Network,
  evidence: Evidence = new Map(),
  options: Partial<InferenceConfig> = {},
): Map<Variable, ProbabilityTable<Outcome>> {
  const result = new Map<Variable, ProbabilityTable<Outcome>>();
  for (const variable of network.variables) {
    result.set(variable, ask(variable, evidence, network, options));
  }
  return result;
}
