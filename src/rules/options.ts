/**
 * Builder helpers: options applied to a freshly constructed rule, and the
 * factories adapting plain callbacks to the hook contracts.
 */
import { Rule } from "./rule.js";
import type {
  Awaitable,
  EvaluationHook,
  EvaluationResult,
  ExecutionHook,
  ExecutionResult,
  RuleStrategy,
  RuleView,
} from "./types.js";

/** Mutator applied to a rule before {@link createRule} returns it. */
export type RuleOption<V> = (rule: Rule<V>) => void;

/** Adapt a predicate to an evaluation hook. */
export function booleanEvaluation<V>(predicate: (view: RuleView<V>) => Awaitable<boolean>): EvaluationHook<V> {
  return async (view) => ({ shouldExecute: await predicate(view) });
}

/** Use a callback returning a full {@link EvaluationResult} as-is. */
export function detailedEvaluation<V>(
  evaluate: (view: RuleView<V>) => Awaitable<EvaluationResult>,
): EvaluationHook<V> {
  return evaluate;
}

/** Adapt a callback with no result to an execution hook. */
export function simpleExecution<V>(action: (view: RuleView<V>) => Awaitable<void>): ExecutionHook<V> {
  return async (view) => {
    await action(view);
    return {};
  };
}

/** Use a callback returning a full {@link ExecutionResult} as-is. */
export function detailedExecution<V>(
  action: (view: RuleView<V>) => Awaitable<ExecutionResult>,
): ExecutionHook<V> {
  return action;
}

export function withName<V>(name: string): RuleOption<V> {
  return (rule) => {
    rule.setName(name);
  };
}

export function withEvaluation<V>(hook: EvaluationHook<V>): RuleOption<V> {
  return (rule) => {
    rule.onEval(hook);
  };
}

export function withPreExecution<V>(hook: ExecutionHook<V>): RuleOption<V> {
  return (rule) => {
    rule.onPreExecute(hook);
  };
}

export function withExecution<V>(hook: ExecutionHook<V>): RuleOption<V> {
  return (rule) => {
    rule.onExecute(hook);
  };
}

export function withPostExecution<V>(hook: ExecutionHook<V>): RuleOption<V> {
  return (rule) => {
    rule.onPostExecute(hook);
  };
}

/**
 * Attach children at construction. An arity or ownership violation throws
 * out of {@link createRule}: it is a build-time mistake, not a runtime state.
 */
export function withChildren<V>(...children: Array<Rule<V> | null | undefined>): RuleOption<V> {
  return (rule) => {
    rule.addChildren(...children);
  };
}

/**
 * Construct a rule and apply `options` in order. When an option throws, the
 * children attached by earlier options are released before rethrowing.
 */
export function createRule<V>(strategy: RuleStrategy, ...options: RuleOption<V>[]): Rule<V> {
  const rule = new Rule<V>(strategy);
  try {
    for (const option of options) {
      option(rule);
    }
  } catch (error) {
    rule.releaseChildren();
    throw error;
  }
  return rule;
}

export function createChainRule<V>(...options: RuleOption<V>[]): Rule<V> {
  return createRule("chain", ...options);
}

export function createBestFirstRule<V>(...options: RuleOption<V>[]): Rule<V> {
  return createRule("best_first", ...options);
}
