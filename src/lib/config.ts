import { z } from "zod";

export const inferenceConfigSchema = z.object({
  // Allowed drift of a normalized table's sum away from 1.
  tolerance: z.number().positive().max(1e-3),
  // Upper bound on candidate rows in the joint distribution.
  maxJointRows: z.number().int().positive(),
});

export type InferenceConfig = z.infer<typeof inferenceConfigSchema>;

export const defaultConfig: InferenceConfig = {
  tolerance: 1e-9,
  maxJointRows: 1_000_000,
};

function readEnvNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

/**
 * Merges explicit overrides over environment overrides over the defaults,
 * then validates the result.
 */
export function resolveConfig(
  overrides: Partial<InferenceConfig> = {},
): InferenceConfig {
  const fromEnv: Partial<InferenceConfig> = {};
  const tolerance = readEnvNumber("BAYES_TOLERANCE");
  if (tolerance !== undefined) fromEnv.tolerance = tolerance;
  const maxJointRows = readEnvNumber("BAYES_MAX_JOINT_ROWS");
  if (maxJointRows !== undefined) fromEnv.maxJointRows = maxJointRows;

  return inferenceConfigSchema.parse({
    ...defaultConfig,
    ...fromEnv,
    ...overrides,
  });
}

export default defaultConfig;
