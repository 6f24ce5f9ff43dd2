import type { StructuredLogger } from "../logger.js";
import { asCancellationError, ensureNotCancelled } from "./cancel.js";
import type { RuleContext } from "./context.js";
import {
  ChainArityError,
  type ExecutionPhase,
  MissingContextKeyError,
  NilRuleError,
  RuleContextMissingError,
  RuleEvaluationError,
  RuleExecutionError,
  RuleOwnershipError,
} from "./errors.js";
import { dispatchRules } from "./runner.js";
import type {
  EvaluationHook,
  EvaluationResult,
  ExecutionHook,
  RuleState,
  RuleStatusReporter,
  RuleStrategy,
  RuleView,
} from "./types.js";

/** Services bound to a rule by the runner before it fires. */
export interface RuleBinding<V> {
  context: RuleContext<V>;
  signal: AbortSignal | undefined;
  logger: StructuredLogger;
  statusReporter: RuleStatusReporter | undefined;
}

/** Counter used to name rules built without an explicit name. */
let autoIndex = 0;

function nextRuleName(strategy: RuleStrategy): string {
  autoIndex += 1;
  return `${strategy}-${autoIndex}`;
}

/**
 * Node of a rule tree. A rule owns its children exclusively; a `chain` rule
 * owns at most one. Hooks are optional and default to "proceed" for the
 * evaluation and to no-ops for the execution phases.
 */
export class Rule<V> {
  public readonly strategy: RuleStrategy;
  private ruleName: string;
  private readonly childRules: Rule<V>[] = [];
  /** Ownership marker; never exposed, traversal is top-down only. */
  private owner: Rule<V> | null = null;
  private evaluationHook: EvaluationHook<V> | undefined;
  private preExecuteHook: ExecutionHook<V> | undefined;
  private executeHook: ExecutionHook<V> | undefined;
  private postExecuteHook: ExecutionHook<V> | undefined;
  private binding: RuleBinding<V> | null = null;
  private currentState: RuleState = "idle";

  constructor(strategy: RuleStrategy, name?: string) {
    this.strategy = strategy;
    this.ruleName = name && name.trim().length > 0 ? name : nextRuleName(strategy);
  }

  get name(): string {
    return this.ruleName;
  }

  /** State reached by the last fire, `idle` before the first one. */
  get state(): RuleState {
    return this.currentState;
  }

  get children(): readonly Rule<V>[] {
    return this.childRules;
  }

  get childCount(): number {
    return this.childRules.length;
  }

  hasChildren(): boolean {
    return this.childRules.length > 0;
  }

  setName(name: string): this {
    if (name.trim().length > 0) {
      this.ruleName = name;
    }
    return this;
  }

  onEval(hook: EvaluationHook<V>): this {
    this.evaluationHook = hook;
    return this;
  }

  onPreExecute(hook: ExecutionHook<V>): this {
    this.preExecuteHook = hook;
    return this;
  }

  onExecute(hook: ExecutionHook<V>): this {
    this.executeHook = hook;
    return this;
  }

  onPostExecute(hook: ExecutionHook<V>): this {
    this.postExecuteHook = hook;
    return this;
  }

  /**
   * Append children. The whole batch is validated first, so a rejected call
   * leaves the child list untouched. Throws {@link ChainArityError} when a
   * chain rule would own more than one child, {@link NilRuleError} for absent
   * entries and {@link RuleOwnershipError} for shared or cyclic children.
   */
  addChildren(...rules: Array<Rule<V> | null | undefined>): this {
    if (this.strategy === "chain" && this.childRules.length + rules.length > 1) {
      throw new ChainArityError("children", this.childRules.length + rules.length);
    }
    const accepted: Rule<V>[] = [];
    for (const [index, rule] of rules.entries()) {
      if (!rule) {
        throw new NilRuleError(index);
      }
      this.assertAdoptable(rule, accepted);
      accepted.push(rule);
    }
    for (const rule of accepted) {
      rule.owner = this;
      this.childRules.push(rule);
    }
    return this;
  }

  /**
   * Release the children attached so far. Used by the builder when a later
   * option rejects the rule under construction.
   *
   * @internal
   */
  releaseChildren(): void {
    for (const child of this.childRules) {
      child.owner = null;
    }
    this.childRules.length = 0;
  }

  /**
   * Bind the services of the current run. Called by the runner before each
   * fire, so a subtree can be reused across runs with different contexts.
   *
   * @internal
   */
  bind(binding: RuleBinding<V>): void {
    this.binding = binding;
  }

  /**
   * Fire the rule: check cancellation, evaluate, run the three execution
   * phases, then dispatch the children under this rule's strategy.
   *
   * Resolves with the continuation signal: `chain` rules always keep going,
   * `best_first` rules stop their siblings once they executed.
   *
   * @internal
   */
  async fire(): Promise<boolean> {
    const binding = this.binding;
    if (!binding) {
      throw new RuleContextMissingError();
    }
    try {
      return await this.fireBound(binding);
    } catch (error) {
      this.transition(binding, "failed");
      throw error;
    }
  }

  toString(): string {
    return `Rule{name: ${this.ruleName}, strategy: ${this.strategy}, children: ${this.childRules.length}}`;
  }

  private async fireBound(binding: RuleBinding<V>): Promise<boolean> {
    ensureNotCancelled(binding.signal, this.ruleName);

    const view = this.createView(binding);
    const evaluation = await this.evaluate(view);
    this.transition(binding, "evaluated");

    if (!evaluation.shouldExecute) {
      this.transition(binding, "skipped");
      binding.logger.debug("rule_skipped", { rule: this.ruleName, strategy: this.strategy });
      return true;
    }

    await this.runPhase("pre_execute", this.preExecuteHook, view);
    await this.runPhase("execute", this.executeHook, view);
    await this.runPhase("post_execute", this.postExecuteHook, view);
    this.transition(binding, "executed");
    binding.logger.debug("rule_executed", {
      rule: this.ruleName,
      strategy: this.strategy,
      children: this.childRules.length,
    });

    await dispatchRules(this.strategy, binding, binding.logger, this.childRules);

    return this.strategy === "chain";
  }

  private async evaluate(view: RuleView<V>): Promise<EvaluationResult> {
    const hook = this.evaluationHook;
    if (!hook) {
      return { shouldExecute: true };
    }
    let result: EvaluationResult;
    try {
      result = await hook(view);
    } catch (error) {
      throw this.passThrough(error, view) ?? new RuleEvaluationError(this.ruleName, error);
    }
    if (result.error) {
      throw new RuleEvaluationError(this.ruleName, result.error);
    }
    return result;
  }

  private async runPhase(
    phase: ExecutionPhase,
    hook: ExecutionHook<V> | undefined,
    view: RuleView<V>,
  ): Promise<void> {
    if (!hook) {
      return;
    }
    let error: Error | undefined;
    try {
      ({ error } = await hook(view));
    } catch (thrown) {
      throw this.passThrough(thrown, view) ?? new RuleExecutionError(this.ruleName, phase, thrown);
    }
    if (error) {
      throw new RuleExecutionError(this.ruleName, phase, error);
    }
  }

  /**
   * Errors a hook may throw that keep their own identity: cancellations and
   * failed `mustGet` assertions. Everything else is wrapped by the caller.
   */
  private passThrough(error: unknown, view: RuleView<V>): Error | null {
    if (error instanceof MissingContextKeyError) {
      return error;
    }
    return asCancellationError(error, view.signal, this.ruleName);
  }

  private createView(binding: RuleBinding<V>): RuleView<V> {
    return {
      name: this.ruleName,
      strategy: this.strategy,
      context: binding.context,
      signal: binding.signal,
      logger: binding.logger,
      isCancelled: () => binding.signal?.aborted ?? false,
    };
  }

  private transition(binding: RuleBinding<V>, state: RuleState): void {
    this.currentState = state;
    binding.statusReporter?.(this.ruleName, state);
  }

  /** Reject children that already have an owner or would close a cycle. */
  private assertAdoptable(rule: Rule<V>, pending: readonly Rule<V>[]): void {
    if (rule.owner !== null || pending.includes(rule)) {
      throw new RuleOwnershipError(rule.name, this.ruleName, `rule ${rule.name} already has a parent`);
    }
    let ancestor: Rule<V> | null = this;
    while (ancestor) {
      if (ancestor === rule) {
        throw new RuleOwnershipError(rule.name, this.ruleName, `adding ${rule.name} under ${this.ruleName} creates a cycle`);
      }
      ancestor = ancestor.owner;
    }
  }
}
