/**
 * Rule engine type system centralising the strategy tag, hook contracts and
 * the view handed to hooks while a rule fires.
 */
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import type { RuleContext } from "./context.js";

/**
 * Traversal strategy carried by every rule.
 * - `chain`: strict single-child linear sequence.
 * - `best_first`: ordered siblings, the first rule that executes wins.
 */
export const RuleStrategySchema = z.enum(["chain", "best_first"]);

export type RuleStrategy = z.infer<typeof RuleStrategySchema>;

/**
 * Firing states reported for a rule. `failed` covers every error path,
 * cancellation included.
 */
export type RuleState = "idle" | "evaluated" | "executed" | "skipped" | "failed";

/** Value or promise of it. Hooks may be synchronous or asynchronous. */
export type Awaitable<T> = T | Promise<T>;

/** Result produced by an evaluation hook. */
export interface EvaluationResult {
  /** Whether the rule should run its execution hooks and children. */
  shouldExecute: boolean;
  /** Optional failure reported by the hook; aborts the rule when set. */
  error?: Error;
}

/** Result produced by the pre-execute, execute and post-execute hooks. */
export interface ExecutionResult {
  error?: Error;
}

/**
 * View of a firing rule handed to every hook. It exposes the bound context and
 * cancellation signal without giving hooks access to the rule's children.
 */
export interface RuleView<V> {
  /** Name of the rule, as passed to `withName` or generated at construction. */
  readonly name: string;
  /** Strategy tag of the rule being fired. */
  readonly strategy: RuleStrategy;
  /** Shared context bound by the runner. */
  readonly context: RuleContext<V>;
  /** Cancellation signal bound by the runner, when any. */
  readonly signal: AbortSignal | undefined;
  /** Logger bound by the runner. */
  readonly logger: StructuredLogger;
  /** Predicate exposing the cancellation state for cooperative checks. */
  isCancelled(): boolean;
}

export type EvaluationHook<V> = (view: RuleView<V>) => Awaitable<EvaluationResult>;

export type ExecutionHook<V> = (view: RuleView<V>) => Awaitable<ExecutionResult>;

/** Callback invoked whenever a rule reports a new state. */
export type RuleStatusReporter = (rule: string, state: RuleState) => void;
