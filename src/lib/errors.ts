export type BayesNetErrorCode =
  | "UNKNOWN_VARIABLE"
  | "DUPLICATE_VARIABLE"
  | "MISSING_CONDITIONAL_ROW"
  | "MISSING_PARENT_VALUE"
  | "MISSING_OUTCOME"
  | "VARIABLE_NOT_IN_NETWORK"
  | "ZERO_TOTAL_PROBABILITY"
  | "INVALID_PROBABILITY_VALUE"
  | "INVALID_CONDITIONAL_TABLE"
  | "JOINT_DISTRIBUTION_TOO_LARGE";

/**
 * Base class for every failure raised by the engine. None of these are
 * retried: they all point at a malformed network or query.
 */
export class BayesNetError extends Error {
  readonly code: BayesNetErrorCode;

  constructor(code: BayesNetErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownVariableError extends BayesNetError {
  constructor(readonly variableName: string) {
    super("UNKNOWN_VARIABLE", `Unknown variable: ${variableName}`);
  }
}

export class DuplicateVariableError extends BayesNetError {
  constructor(readonly variableName: string) {
    super(
      "DUPLICATE_VARIABLE",
      `Variable ${variableName} is already part of this network`,
    );
  }
}

export class MissingConditionalRowError extends BayesNetError {
  constructor(readonly rowKey: string) {
    super(
      "MISSING_CONDITIONAL_ROW",
      `No CPT row for parent values ${rowKey}`,
    );
  }
}

export class MissingParentValueError extends BayesNetError {
  constructor(
    readonly variableName: string,
    readonly parentName: string,
  ) {
    super(
      "MISSING_PARENT_VALUE",
      `Cannot resolve CPT row for ${variableName}: parent ${parentName} has no assigned value`,
    );
  }
}

export class MissingOutcomeError extends BayesNetError {
  constructor(readonly outcomeKey: string) {
    super("MISSING_OUTCOME", `Outcome ${outcomeKey} is not in the table`);
  }
}

export class VariableNotInNetworkError extends BayesNetError {
  constructor(readonly variableName: string) {
    super(
      "VARIABLE_NOT_IN_NETWORK",
      `Variable ${variableName} does not belong to this network`,
    );
  }
}

export class ZeroTotalProbabilityError extends BayesNetError {
  constructor() {
    super(
      "ZERO_TOTAL_PROBABILITY",
      "Cannot normalize: total probability is zero",
    );
  }
}

export class InvalidProbabilityValueError extends BayesNetError {
  constructor(readonly value: number) {
    super(
      "INVALID_PROBABILITY_VALUE",
      `Invalid probability value: ${value}. Must be between 0 and 1.`,
    );
  }
}

export class InvalidConditionalTableError extends BayesNetError {
  constructor(message: string) {
    super("INVALID_CONDITIONAL_TABLE", message);
  }
}

export class JointDistributionTooLargeError extends BayesNetError {
  constructor(
    readonly rowCount: number,
    readonly limit: number,
  ) {
    super(
      "JOINT_DISTRIBUTION_TOO_LARGE",
      `Joint distribution too large: ${rowCount} rows exceeds the limit of ${limit}. Enumeration requires exponential memory.`,
    );
  }
}
