/**
 * Base error used by the rule engine. Every subclass exposes a stable `code`,
 * a short `hint` and structured `details` so embedding hosts can branch on the
 * failure without parsing messages.
 */
export class RuleEngineError extends Error {
  public readonly code: string;
  public readonly hint: string;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    hint: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RuleEngineError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

/** Raised when a run is requested without a rule context. */
export class RuleContextMissingError extends RuleEngineError {
  constructor() {
    super("rule context cannot be nil", "E-RULE-CONTEXT", "create a RuleContext before running the rules");
    this.name = "RuleContextMissingError";
  }
}

/** Raised when a rule reference is absent from a batch or a child list. */
export class NilRuleError extends RuleEngineError {
  declare readonly details: { index: number | null };

  constructor(index: number | null = null) {
    super(
      index === null ? "rule cannot be nil" : `rule at index ${index} is nil`,
      "E-RULE-NIL",
      "remove empty entries from the rule list",
      { index },
    );
    this.name = "NilRuleError";
  }
}

/** Identifies which chain constraint was violated. */
export type ChainArityViolation = "children" | "roots";

/**
 * Raised when a chain rule would own more than one child, or when a chain run
 * receives more than one root.
 */
export class ChainArityError extends RuleEngineError {
  declare readonly details: { reason: ChainArityViolation; count: number };

  constructor(reason: ChainArityViolation, count: number) {
    super(
      reason === "children" ? "chain rule can only have one child" : "chain rule runner only supports one rule",
      "E-RULE-CHAIN-ARITY",
      reason === "children" ? "use a best_first rule to branch" : "pass a single root to a chain run",
      { reason, count },
    );
    this.name = "ChainArityError";
  }
}

/** Raised when a child is already owned by a parent or would close a cycle. */
export class RuleOwnershipError extends RuleEngineError {
  declare readonly details: { rule: string; parent: string };

  constructor(rule: string, parent: string, message: string) {
    super(message, "E-RULE-OWNERSHIP", "build a separate rule instance for each position in the tree", {
      rule,
      parent,
    });
    this.name = "RuleOwnershipError";
  }
}

/** Raised when a rule observes an aborted cancellation signal at entry. */
export class RuleCancelledError extends RuleEngineError {
  declare readonly details: { rule: string | null; reason: string | null };

  constructor(rule: string | null, reason: string | null, options?: ErrorOptions) {
    super(
      reason ? `rule execution cancelled: ${reason}` : "rule execution cancelled",
      "E-RULE-CANCELLED",
      "the run was cancelled by its issuer",
      { rule, reason },
      options,
    );
    this.name = "RuleCancelledError";
  }
}

/** Raised when an evaluation hook reports or throws an error. */
export class RuleEvaluationError extends RuleEngineError {
  declare readonly details: { rule: string };

  constructor(rule: string, cause: unknown) {
    super(`evaluation of ${rule} failed: ${describeCause(cause)}`, "E-RULE-EVAL", "inspect the error cause", { rule }, {
      cause,
    });
    this.name = "RuleEvaluationError";
  }
}

/** Lifecycle phase in which an execution hook failed. */
export type ExecutionPhase = "pre_execute" | "execute" | "post_execute";

/** Raised when one of the execution hooks reports or throws an error. */
export class RuleExecutionError extends RuleEngineError {
  declare readonly details: { rule: string; phase: ExecutionPhase };

  constructor(rule: string, phase: ExecutionPhase, cause: unknown) {
    super(`${phase} of ${rule} failed: ${describeCause(cause)}`, "E-RULE-EXEC", "inspect the error cause", {
      rule,
      phase,
    }, { cause });
    this.name = "RuleExecutionError";
  }
}

/** Raised when a run is requested with a strategy other than `chain` or `best_first`. */
export class InvalidRuleStrategyError extends RuleEngineError {
  declare readonly details: { strategy: string };

  constructor(strategy: unknown) {
    super(`invalid rule strategy: ${String(strategy)}`, "E-RULE-STRATEGY", "use \"chain\" or \"best_first\"", {
      strategy: String(strategy),
    });
    this.name = "InvalidRuleStrategyError";
  }
}

/** Raised by {@link RuleContext.mustGet} when the asserted key is absent. */
export class MissingContextKeyError extends RuleEngineError {
  declare readonly details: { key: string };

  constructor(key: string) {
    super(`key '${key}' not found in rule context`, "E-RULE-CONTEXT-KEY", "seed the key before reading it", { key });
    this.name = "MissingContextKeyError";
  }
}

/** Narrow an unknown value to a {@link RuleEngineError}. */
export function isRuleEngineError(value: unknown): value is RuleEngineError {
  return value instanceof RuleEngineError;
}

/** Message fragment describing the cause attached to a hook failure. */
function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
