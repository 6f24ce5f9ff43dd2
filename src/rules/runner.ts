import { getDefaultEngineLogger } from "../config/engineConfig.js";
import type { StructuredLogger } from "../logger.js";
import type { RuleContext } from "./context.js";
import {
  ChainArityError,
  InvalidRuleStrategyError,
  NilRuleError,
  RuleContextMissingError,
} from "./errors.js";
import type { Rule, RuleBinding } from "./rule.js";
import { type RuleStatusReporter, type RuleStrategy, RuleStrategySchema } from "./types.js";

/** Services shared by every rule of a run. */
export interface RunOptions {
  /** Cancellation token; an aborted signal fails every rule still pending. */
  signal?: AbortSignal;
  /** Logger receiving the run diagnostics. Defaults to the engine logger. */
  logger?: StructuredLogger;
  /** Optional callback invoked whenever a rule reports a new state. */
  statusReporter?: RuleStatusReporter;
}

/** Everything a run needs besides the strategy and the rules. */
export interface RunRequest<V> extends RunOptions {
  context: RuleContext<V> | null | undefined;
}

/** Rule reference as accepted from callers, absent entries included. */
export type RuleInput<V> = Rule<V> | null | undefined;

/**
 * Fire `rules` under `strategy`, threading `request.context` through every
 * hook. Resolves once the traversal completes; rejects with the first error.
 *
 * - `chain` accepts exactly one root.
 * - `best_first` fires the roots in order and stops after the first one that
 *   executes.
 */
export async function runRules<V>(
  strategy: RuleStrategy,
  request: RunRequest<V>,
  ...rules: RuleInput<V>[]
): Promise<void> {
  const logger = request.logger ?? getDefaultEngineLogger();
  logger.debug("rule_run_started", { strategy, roots: rules.length });
  try {
    await dispatchRules(strategy, request, logger, rules);
  } catch (error) {
    logger.error("rule_run_failed", {
      strategy,
      error: error instanceof Error ? { name: error.name, message: error.message } : String(error),
    });
    throw error;
  }
  logger.debug("rule_run_completed", { strategy });
}

/** Run a single chain root. */
export async function runChain<V>(
  context: RuleContext<V>,
  rule: RuleInput<V>,
  options: RunOptions = {},
): Promise<void> {
  await runRules("chain", { ...options, context }, rule);
}

/** Run best-first siblings in the given order. */
export async function runBestFirst<V>(
  context: RuleContext<V>,
  rules: readonly RuleInput<V>[],
  options: RunOptions = {},
): Promise<void> {
  await runRules("best_first", { ...options, context }, ...rules);
}

/**
 * Strategy-specific iteration shared by the public entry point and by rules
 * dispatching their children. Checks run in order: context, empty batch,
 * absent rules, strategy, chain arity.
 *
 * @internal
 */
export async function dispatchRules<V>(
  strategy: RuleStrategy,
  request: RunRequest<V>,
  logger: StructuredLogger,
  rules: readonly RuleInput<V>[],
): Promise<void> {
  const context = request.context;
  if (!context) {
    throw new RuleContextMissingError();
  }
  if (rules.length === 0) {
    return;
  }
  const batch = requirePresent(rules);
  if (!RuleStrategySchema.safeParse(strategy).success) {
    throw new InvalidRuleStrategyError(strategy);
  }

  const binding: RuleBinding<V> = {
    context,
    signal: request.signal,
    logger,
    statusReporter: request.statusReporter,
  };

  switch (strategy) {
    case "chain": {
      const [root] = batch;
      if (batch.length > 1 || !root) {
        throw new ChainArityError("roots", batch.length);
      }
      root.bind(binding);
      await root.fire();
      return;
    }
    case "best_first": {
      for (const rule of batch) {
        rule.bind(binding);
        const keepGoing = await rule.fire();
        if (!keepGoing) {
          return;
        }
      }
      return;
    }
    default: {
      const exhaustive: never = strategy;
      throw new InvalidRuleStrategyError(exhaustive);
    }
  }
}

/** Reject absent entries, reporting the first offending index. */
function requirePresent<V>(rules: readonly RuleInput<V>[]): Rule<V>[] {
  const present: Rule<V>[] = [];
  for (const [index, rule] of rules.entries()) {
    if (!rule) {
      throw new NilRuleError(index);
    }
    present.push(rule);
  }
  return present;
}
