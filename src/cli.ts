import { validateNetwork } from "./lib/cptValidation";
import { ask, marginals } from "./lib/enumerationQuery";
import { formatDistribution } from "./lib/formatProbability";
import { loadNetwork } from "./lib/loadNetwork";
import * as logger from "./lib/logger";
import type { Evidence, Network } from "./lib/network";
import type { Outcome } from "./lib/outcome";
import type { Variable } from "./lib/variable";

const USAGE = [
  "Usage: bayes-enum <command> [args]",
  "Commands:",
  "  query <network.json> <Variable> [Name=value ...]",
  "  marginals <network.json> [Name=value ...]",
  "  validate <network.json>",
].join("\n");

// Command-line values are strings; match them against the domain by their
// string form so `Flag=true` finds the boolean outcome.
export function parseOutcome(variable: Variable, text: string): Outcome {
  const outcome = variable.domain.find((value) => String(value) === text);
  if (outcome === undefined) {
    logger.warn(`${variable.name} has no outcome ${text}; using it as a string`);
    return text;
  }
  return outcome;
}

export function parseEvidence(network: Network, args: string[]): Evidence {
  const evidence = new Map<Variable, Outcome>();
  for (const arg of args) {
    const separator = arg.indexOf("=");
    if (separator <= 0) {
      throw new Error(`Evidence must look like Name=value, got: ${arg}`);
    }
    const variable = network.lookup(arg.slice(0, separator));
    evidence.set(variable, parseOutcome(variable, arg.slice(separator + 1)));
  }
  return evidence;
}

async function cmdQuery(input: string, queryName: string, rest: string[]) {
  if (!input || !queryName) throw new Error(USAGE);
  const network = await loadNetwork(input);
  const query = network.lookup(queryName);
  const posterior = ask(query, parseEvidence(network, rest), network);
  logger.info(`P(${query.name} | evidence)`);
  logger.info(formatDistribution(posterior));
}

async function cmdMarginals(input: string, rest: string[]) {
  if (!input) throw new Error(USAGE);
  const network = await loadNetwork(input);
  const result = marginals(network, parseEvidence(network, rest));
  for (const [variable, distribution] of result) {
    logger.info(`${variable.name}:`);
    logger.info(formatDistribution(distribution));
  }
}

async function cmdValidate(input: string) {
  if (!input) throw new Error(USAGE);
  const network = await loadNetwork(input);
  const result = validateNetwork(network);
  if (!result.valid) throw new Error(result.error);
  logger.info(`${network.name}: ${network.size} variables, all CPTs complete`);
}

export async function main(argv: string[]): Promise<number> {
  const [cmd, ...args] = argv;
  try {
    if (cmd === "query") await cmdQuery(args[0], args[1], args.slice(2));
    else if (cmd === "marginals") await cmdMarginals(args[0], args.slice(1));
    else if (cmd === "validate") await cmdValidate(args[0]);
    else {
      logger.info(USAGE);
      return 1;
    }
    return 0;
  } catch (e) {
    logger.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
}

