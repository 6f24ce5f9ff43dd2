export { RuleContext, type RuleContextLookup, type RuleContextSeed } from "./rules/context.js";
export { Rule, type RuleBinding } from "./rules/rule.js";
export { runRules, runChain, runBestFirst, type RunOptions, type RunRequest, type RuleInput } from "./rules/runner.js";
export {
  createRule,
  createChainRule,
  createBestFirstRule,
  withName,
  withEvaluation,
  withPreExecution,
  withExecution,
  withPostExecution,
  withChildren,
  booleanEvaluation,
  detailedEvaluation,
  simpleExecution,
  detailedExecution,
  type RuleOption,
} from "./rules/options.js";
export {
  RuleStrategySchema,
  type RuleStrategy,
  type RuleState,
  type RuleView,
  type RuleStatusReporter,
  type EvaluationHook,
  type EvaluationResult,
  type ExecutionHook,
  type ExecutionResult,
  type Awaitable,
} from "./rules/types.js";
export {
  asCancellationError,
  createCancellation,
  describeAbortReason,
  isCancellationError,
  type CancellationHandle,
  type CancellationRequestOutcome,
  type CreateCancellationOptions,
} from "./rules/cancel.js";
export {
  RuleEngineError,
  RuleContextMissingError,
  NilRuleError,
  ChainArityError,
  RuleOwnershipError,
  RuleCancelledError,
  RuleEvaluationError,
  RuleExecutionError,
  InvalidRuleStrategyError,
  MissingContextKeyError,
  isRuleEngineError,
  type ChainArityViolation,
  type ExecutionPhase,
} from "./rules/errors.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export {
  loadRuleEngineConfig,
  createEngineLogger,
  getDefaultEngineLogger,
  setDefaultEngineLogger,
  RuleEngineConfigSchema,
  DEFAULT_RULE_ENGINE_CONFIG,
  type RuleEngineConfig,
} from "./config/engineConfig.js";
