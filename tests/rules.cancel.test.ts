import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { asCancellationError, createCancellation, describeAbortReason, ensureNotCancelled } from "../src/rules/cancel.js";
import { RuleContext } from "../src/rules/context.js";
import { RuleCancelledError, RuleExecutionError } from "../src/rules/errors.js";
import { booleanEvaluation, simpleExecution } from "../src/rules/options.js";
import { Rule } from "../src/rules/rule.js";
import { runBestFirst, runChain } from "../src/rules/runner.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { RuleTrace } from "./helpers/ruleTrace.js";

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("cancellation handles", () => {
  it("cancels once and keeps the first reason", () => {
    const handle = createCancellation({ now: () => 1_000 });
    expect(handle.isCancelled()).to.equal(false);
    expect(handle.cancelledAt).to.equal(null);

    expect(handle.cancel("operator request")).to.equal("requested");
    expect(handle.cancel("second request")).to.equal("already_cancelled");

    expect(handle.isCancelled()).to.equal(true);
    expect(handle.signal.aborted).to.equal(true);
    expect(handle.reason).to.equal("operator request");
    expect(handle.cancelledAt).to.equal(1_000);
  });

  it("notifies subscribers and honours disposers", () => {
    const handle = createCancellation({ now: () => 42 });
    const kept = sinon.spy();
    const dropped = sinon.spy();
    handle.onCancel(kept);
    const dispose = handle.onCancel(dropped);
    dispose();

    handle.cancel("stop");

    sinon.assert.calledOnceWithExactly(kept, { reason: "stop", at: 42 });
    sinon.assert.notCalled(dropped);
  });

  it("throws structured errors once cancelled", () => {
    const handle = createCancellation();
    expect(() => handle.throwIfCancelled()).to.not.throw();
    handle.cancel();
    expect(() => handle.throwIfCancelled()).to.throw(RuleCancelledError, "rule execution cancelled");
  });

  it("extracts readable reasons from abort signals", () => {
    const bare = new AbortController();
    bare.abort();
    expect(describeAbortReason(bare.signal.reason)).to.equal(null);

    const described = new AbortController();
    described.abort("deadline exceeded");
    expect(describeAbortReason(described.signal.reason)).to.equal("deadline exceeded");
    expect(describeAbortReason(new Error("upstream closed"))).to.equal("upstream closed");
    expect(describeAbortReason(new RuleCancelledError(null, "shutdown"))).to.equal("shutdown");
  });

  it("classifies abort errors only while the signal is aborted", () => {
    const controller = new AbortController();
    const abortError = new Error("aborted");
    abortError.name = "AbortError";

    expect(asCancellationError(abortError, controller.signal, "lookup")).to.equal(null);
    expect(asCancellationError(abortError, undefined, "lookup")).to.equal(null);

    controller.abort();
    const converted = asCancellationError(abortError, controller.signal, "lookup");
    expect(converted).to.be.instanceOf(RuleCancelledError);
    expect(converted?.details).to.deep.equal({ rule: "lookup", reason: null });
    expect(asCancellationError(new TypeError("bad"), controller.signal, "lookup")).to.equal(null);
  });

  it("names the rule that observed the cancellation", () => {
    const controller = new AbortController();
    controller.abort("deadline exceeded");

    let caught: unknown;
    try {
      ensureNotCancelled(controller.signal, "pricing");
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(RuleCancelledError);
    if (caught instanceof RuleCancelledError) {
      expect(caught.details).to.deep.equal({ rule: "pricing", reason: "deadline exceeded" });
      expect(caught.message).to.equal("rule execution cancelled: deadline exceeded");
    }
  });
});

describe("cancelled runs", () => {
  it("fails before any hook when the token is already cancelled", async () => {
    const trace = new RuleTrace();
    const root = trace.rule("chain", "root", true);
    root.addChildren(trace.rule("chain", "child", true));
    const handle = createCancellation();
    handle.cancel("shutdown");
    const context = new RuleContext<string>();

    const error = await rejectionOf(runChain(context, root, { signal: handle.signal, logger: new RecordingLogger() }));

    expect(error).to.be.instanceOf(RuleCancelledError);
    if (error instanceof RuleCancelledError) {
      expect(error.details).to.deep.equal({ rule: "root", reason: "shutdown" });
    }
    expect(trace.calls).to.deep.equal([]);
    expect(context.size).to.equal(0);
    expect(root.state).to.equal("failed");
  });

  it("fails a best-first batch without running hooks", async () => {
    const trace = new RuleTrace();
    const siblings = [trace.rule("best_first", "a", false), trace.rule("best_first", "b", true)];
    const controller = new AbortController();
    controller.abort();

    const error = await rejectionOf(
      runBestFirst(new RuleContext<string>(), siblings, { signal: controller.signal, logger: new RecordingLogger() }),
    );

    expect(error).to.be.instanceOf(RuleCancelledError);
    expect(trace.calls).to.deep.equal([]);
  });

  it("stops descending once a hook cancels mid-run", async () => {
    const handle = createCancellation();
    const calls: string[] = [];
    const root = new Rule<string>("chain", "root").onExecute(
      simpleExecution(() => {
        calls.push("root:execute");
        handle.cancel("limit reached");
        calls.push("root:execute:finished");
      }),
    );
    const child = new Rule<string>("chain", "child").onEval(
      booleanEvaluation(() => {
        calls.push("child:eval");
        return true;
      }),
    );
    root.addChildren(child);

    const error = await rejectionOf(
      runChain(new RuleContext<string>(), root, { signal: handle.signal, logger: new RecordingLogger() }),
    );

    // The running hook completes; the cancellation is observed at the next rule entry.
    expect(calls).to.deep.equal(["root:execute", "root:execute:finished"]);
    expect(error).to.be.instanceOf(RuleCancelledError);
    if (error instanceof RuleCancelledError) {
      expect(error.details).to.deep.equal({ rule: "child", reason: "limit reached" });
    }
  });

  it("lets hooks observe the token cooperatively", async () => {
    const handle = createCancellation();
    const observed: boolean[] = [];
    const rule = new Rule<string>("chain", "observer").onExecute(
      simpleExecution((view) => {
        observed.push(view.isCancelled());
        handle.cancel();
        observed.push(view.isCancelled());
        observed.push(view.signal === handle.signal);
      }),
    );

    await runChain(new RuleContext<string>(), rule, { signal: handle.signal, logger: new RecordingLogger() });

    expect(observed).to.deep.equal([false, true, true]);
  });

  it("treats hooks honouring a plain abort signal as cancelled", async () => {
    const controller = new AbortController();
    const rule = new Rule<string>("chain", "watcher").onExecute(
      simpleExecution(({ signal }) => {
        controller.abort("budget spent");
        signal?.throwIfAborted();
      }),
    );

    const error = await rejectionOf(
      runChain(new RuleContext<string>(), rule, { signal: controller.signal, logger: new RecordingLogger() }),
    );

    expect(error).to.be.instanceOf(RuleCancelledError);
    if (error instanceof RuleCancelledError) {
      expect(error.details).to.deep.equal({ rule: "watcher", reason: "budget spent" });
      expect(error.cause).to.equal("budget spent");
    }
    expect(rule.state).to.equal("failed");
  });

  it("maps a reasonless abort raised during evaluation to a cancellation", async () => {
    const controller = new AbortController();
    const rule = new Rule<string>("chain", "gate").onEval(({ signal }) => {
      controller.abort();
      signal?.throwIfAborted();
      return { shouldExecute: true };
    });

    const error = await rejectionOf(
      runChain(new RuleContext<string>(), rule, { signal: controller.signal, logger: new RecordingLogger() }),
    );

    expect(error).to.be.instanceOf(RuleCancelledError);
    if (error instanceof RuleCancelledError) {
      expect(error.details).to.deep.equal({ rule: "gate", reason: null });
    }
  });

  it("still wraps unrelated failures raised after an abort", async () => {
    const controller = new AbortController();
    const rule = new Rule<string>("chain", "writer").onExecute(
      simpleExecution(() => {
        controller.abort("stop");
        throw new Error("disk full");
      }),
    );

    const error = await rejectionOf(
      runChain(new RuleContext<string>(), rule, { signal: controller.signal, logger: new RecordingLogger() }),
    );

    expect(error).to.be.instanceOf(RuleExecutionError);
  });

  it("passes cancellation errors raised by hooks through unchanged", async () => {
    const raised = new RuleCancelledError("inner", "hook gave up");
    const rule = new Rule<string>("chain", "outer").onEval(() => {
      throw raised;
    });

    const error = await rejectionOf(runChain(new RuleContext<string>(), rule, { logger: new RecordingLogger() }));

    expect(error).to.equal(raised);
  });
});
