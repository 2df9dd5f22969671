import { resolveConfig, type InferenceConfig } from "./config";
import { JointDistributionTooLargeError } from "./errors";
import { debug } from "./logger";
import type { Network } from "./network";
import type { Outcome, Row } from "./outcome";
import { ProbabilityTable } from "./probabilityTable";
import type { Variable } from "./variable";

export type JointDistribution = ProbabilityTable<Row>;

interface CachedJoint {
  size: number;
  tolerance: number;
  joint: JointDistribution;
}

// Networks are append-only, so the variable count identifies a snapshot.
const jointCache = new WeakMap<Network, CachedJoint>();

export function countJointRows(network: Network): number {
  let count = 1;
  for (const variable of network.variables) {
    count *= variable.domain.length;
  }
  return count;
}

// Helper: enumerate the Cartesian product of domains, first variable slowest
function* enumerateRows(variables: readonly Variable[]): Generator<Row> {
  const n = variables.length;
  const positions = new Array<number>(n).fill(0);

  while (true) {
    yield variables.map((variable, i) => variable.domain[positions[i]]);

    let i = n - 1;
    while (i >= 0) {
      positions[i]++;
      if (positions[i] < variables[i].domain.length) break;
      positions[i] = 0;
      i--;
    }
    if (i < 0) return;
  }
}

function rowProbability(variables: readonly Variable[], row: Row): number {
  const assignment = new Map<Variable, Outcome>();
  variables.forEach((variable, i) => assignment.set(variable, row[i]));

  let probability = 1;
  for (const variable of variables) {
    probability *= variable.probabilityOf(row[variable.index], assignment);
  }
  return probability;
}

/**
 * The full joint distribution of `network`, keyed by one outcome per variable
 * in canonical order.
 *
 * Every row of the Cartesian product of domains is enumerated, so cost grows
 * exponentially with the variable count; `maxJointRows` bounds it. Results
 * are cached per network snapshot and tolerance.
 */
export function jointDistribution(
  network: Network,
  options: Partial<InferenceConfig> = {},
): JointDistribution {
  const config = resolveConfig(options);
  const rowCount = countJointRows(network);
  if (rowCount > config.maxJointRows) {
    throw new JointDistributionTooLargeError(rowCount, config.maxJointRows);
  }

  const cached = jointCache.get(network);
  if (
    cached &&
    cached.size === network.size &&
    cached.tolerance === config.tolerance
  ) {
    return cached.joint;
  }

  const variables = network.variables;
  const weights: Array<readonly [Row, number]> = [];
  for (const row of enumerateRows(variables)) {
    weights.push([row, rowProbability(variables, row)]);
  }
  debug(`Enumerated ${weights.length} joint rows for ${network.name}`);

  const joint = ProbabilityTable.normalize(weights, config.tolerance);
  jointCache.set(network, {
    size: network.size,
    tolerance: config.tolerance,
    joint,
  });
  return joint;
}
