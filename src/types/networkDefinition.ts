import { z } from "zod";

export const outcomeSchema = z.union([z.boolean(), z.string(), z.number()]);

export const distributionSchema = z.union([
  z.number(),
  z.record(z.string(), z.number()),
]);

export const cptRowSchema = z.object({
  row: z.union([outcomeSchema, z.array(outcomeSchema)]),
  distribution: distributionSchema,
});

export const variableDefinitionSchema = z.object({
  name: z.string().min(1),
  parents: z.array(z.string()).default([]),
  cpt: z.union([distributionSchema, z.array(cptRowSchema)]),
});

export const networkDefinitionSchema = z.object({
  name: z.string().optional(),
  variables: z.array(variableDefinitionSchema),
});

export type OutcomeDefinition = z.infer<typeof outcomeSchema>;
export type DistributionDefinition = z.infer<typeof distributionSchema>;
export type CptRowDefinition = z.infer<typeof cptRowSchema>;
export type VariableDefinition = z.infer<typeof variableDefinitionSchema>;
export type NetworkDefinition = z.infer<typeof networkDefinitionSchema>;
