export * from "./lib/errors";
export type { Outcome, Row } from "./lib/outcome";
export { defaultConfig, resolveConfig } from "./lib/config";
export type { InferenceConfig } from "./lib/config";
export { ProbabilityTable } from "./lib/probabilityTable";
export type { TableKey, Weights } from "./lib/probabilityTable";
export { ConditionalTable } from "./lib/conditionalTable";
export type {
  CptSpec,
  DistributionSpec,
  RowEntry,
  RowKey,
} from "./lib/conditionalTable";
export { Variable } from "./lib/variable";
export type { Assignment } from "./lib/variable";
export { Network } from "./lib/network";
export type { Evidence, NetworkOptions } from "./lib/network";
export { countJointRows, jointDistribution } from "./lib/jointDistribution";
export type { JointDistribution } from "./lib/jointDistribution";
export { ask, marginals } from "./lib/enumerationQuery";
export { sample } from "./lib/sample";
export {
  expandParentRows,
  validateConditionalTable,
  validateNetwork,
} from "./lib/cptValidation";
export type { ValidationResult } from "./lib/cptValidation";
export { buildNetwork, loadNetwork } from "./lib/loadNetwork";
export {
  formatDistribution,
  formatProbability,
  formatProbabilityAsPercentage,
} from "./lib/formatProbability";
export * from "./types/networkDefinition";
