/**
 * Error types raised by request validation and the generators.
 *
 * Every error carries a stable `code` so callers can render a
 * specific message without matching on text.
 */

export type OptimizerErrorCode =
  | "INVALID_STRATEGY"
  | "INVALID_PARAMETER"
  | "UNKNOWN_ENTITY"
  | "INFEASIBLE_CONSTRAINT"
  | "EXHAUSTIVE_GUARD";

export type ErrorDetails = Readonly<Record<string, string | number | boolean | readonly string[]>>;

export class OptimizerError extends Error {
  readonly code: OptimizerErrorCode;
  readonly details: ErrorDetails;

  constructor(code: OptimizerErrorCode, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidStrategyError extends OptimizerError {
  readonly strategy: string;

  constructor(strategy: string, allowed: readonly string[]) {
    super("INVALID_STRATEGY", `Unknown strategy "${strategy}". Expected one of: ${allowed.join(", ")}`, {
      strategy,
      allowed,
    });
    this.strategy = strategy;
  }
}

export class InvalidParameterError extends OptimizerError {
  readonly parameter: string;

  constructor(parameter: string, message: string, details: ErrorDetails = {}) {
    super("INVALID_PARAMETER", message, { parameter, ...details });
    this.parameter = parameter;
  }
}

export type EntityKind = "cookie" | "treasure" | "boss";

export class UnknownEntityError extends OptimizerError {
  readonly kind: EntityKind;
  readonly names: readonly string[];
  /** Where the names were referenced (required, enemy, overrides, ...) */
  readonly source: string;

  constructor(kind: EntityKind, source: string, names: readonly string[]) {
    super("UNKNOWN_ENTITY", `Unknown ${kind} name(s) in ${source}: ${names.join(", ")}`, {
      kind,
      source,
      names,
    });
    this.kind = kind;
    this.names = names;
    this.source = source;
  }
}

export class InfeasibleConstraintError extends OptimizerError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("INFEASIBLE_CONSTRAINT", message, details);
  }
}

export class ExhaustiveGuardError extends OptimizerError {
  constructor(poolSize: number, requiredCount: number, minRequired: number) {
    super(
      "EXHAUSTIVE_GUARD",
      `Exhaustive search over ${poolSize} cookies needs at least ${minRequired} required members ` +
        `(got ${requiredCount}), or an explicit time or combination budget`,
      { poolSize, requiredCount, minRequired }
    );
  }
}

export function isOptimizerError(error: unknown): error is OptimizerError {
  return error instanceof OptimizerError;
}
