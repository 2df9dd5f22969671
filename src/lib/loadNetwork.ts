import fs from "node:fs/promises";
import {
  networkDefinitionSchema,
  type VariableDefinition,
} from "../types/networkDefinition";
import type { CptSpec, RowEntry } from "./conditionalTable";
import { Network, type NetworkOptions } from "./network";

function toCptSpec(cpt: VariableDefinition["cpt"]): CptSpec {
  if (!Array.isArray(cpt)) return cpt;
  return cpt.map(({ row, distribution }): RowEntry => [row, distribution]);
}

/**
 * Builds a network from a parsed JSON definition. Variables are added in the
 * order listed, so parents must come first.
 */
export function buildNetwork(
  definition: unknown,
  options: NetworkOptions = {},
): Network {
  const parsed = networkDefinitionSchema.parse(definition);
  const network = new Network({ name: parsed.name, ...options });
  for (const variable of parsed.variables) {
    network.add(variable.name, variable.parents, toCptSpec(variable.cpt));
  }
  return network;
}

export async function loadNetwork(
  filePath: string,
  options: NetworkOptions = {},
): Promise<Network> {
  const raw = await fs.readFile(filePath, "utf8");
  return buildNetwork(JSON.parse(raw), options);
}
