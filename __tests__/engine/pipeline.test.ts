/**
 * Detector Pipeline Tests
 *
 * Tests for concurrency, deadlines, failure isolation and progress
 * reporting using Given-When-Then pattern.
 */

import { describe, it, expect, vi } from "vitest";
import { DetectorPipeline, type DetectorProgress, type PipelineServices } from "../../src/engine/pipeline.js";
import { estimateCosts } from "../../src/gas/costEstimator.js";
import { DEFAULT_COST_TABLE } from "../../src/gas/costTable.js";
import { BaseDetector } from "../../src/detectors/base.js";
import type { ContractModel, Detector, DetectorContext, RawFinding, RuleDefinition } from "../../src/types/index.js";
import { makeContract, makeFunction, testOptions } from "../helpers/models.js";

// ============================================================================
// Test Fixtures
// ============================================================================

const model = makeContract([makeFunction({ name: "withdraw" })]);

function services(model: ContractModel): PipelineServices {
  const config = testOptions();
  return { config, costs: estimateCosts(model, DEFAULT_COST_TABLE, config), costTable: DEFAULT_COST_TABLE };
}

function detector(id: string, inspect: Detector["inspect"]): Detector {
  return { id, name: id, description: id, category: "security", rules: [], inspect };
}

function finding(line: number): RawFinding {
  return { ruleId: "SEC-006", location: { file: "src/lib.rs", line, column: 1 }, description: `finding ${line}` };
}

/** Resolves after `ms`, or rejects as soon as the detector is aborted. */
function sleep(ms: number, context: DetectorContext): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    context.signal.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(context.signal.reason);
      },
      { once: true }
    );
  });
}

/** Holds the thread for `ms` per function, as a CPU-bound detector would. */
class BusyDetector extends BaseDetector {
  readonly name = "Busy";
  readonly description = "Spins on every function";
  readonly category = "security" as const;
  readonly rules: readonly RuleDefinition[] = [];

  constructor(
    readonly id: string,
    private readonly ms: number
  ) {
    super();
  }

  protected override inspectFunction(): RawFinding[] {
    const until = Date.now() + this.ms;
    while (Date.now() < until) {
      // spin
    }
    return [finding(1)];
  }
}

const fiveFunctions = makeContract(
  ["a", "b", "c", "d", "e"].map((name) => makeFunction({ name }))
);

describe("DetectorPipeline", () => {
  // ==========================================================================
  // Ordering
  // ==========================================================================

  it("should return runs in detector order regardless of completion order", async () => {
    // Given: A slow first detector and a fast second one, run in parallel
    const slow = detector("slow", async (_model, context) => {
      await sleep(30, context);
      return [finding(1)];
    });
    const fast = detector("fast", () => [finding(2)]);
    const pipeline = new DetectorPipeline([slow, fast], { maxConcurrency: 2, timeoutMs: 5_000 });

    // When: Running
    const result = await pipeline.run(model, services(model));

    // Then: Input order, both completed
    expect(result.runs.map((run) => [run.detectorId, run.status, run.findings.length])).toEqual([
      ["slow", "completed", 1],
      ["fast", "completed", 1],
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  // ==========================================================================
  // Failure isolation
  // ==========================================================================

  it("should isolate a throwing detector", async () => {
    // Given: A detector that throws next to a healthy one
    const broken = detector("broken", () => {
      throw new Error("boom");
    });
    const healthy = detector("healthy", () => [finding(3)]);
    const pipeline = new DetectorPipeline([broken, healthy], { maxConcurrency: 1, timeoutMs: 5_000 });

    // When: Running
    const result = await pipeline.run(model, services(model));

    // Then: The healthy detector's findings survive
    expect(result.runs[0]).toMatchObject({ detectorId: "broken", status: "failed", findings: [], error: "boom" });
    expect(result.runs[1]?.findings).toEqual([finding(3)]);
    expect(result.diagnostics).toEqual([
      { code: "DETECTOR_FAILED", message: "Detector broken failed: boom", detector: "broken" },
    ]);
  });

  // ==========================================================================
  // Deadlines
  // ==========================================================================

  it("should time out a slow detector without losing the others", async () => {
    // Given: A detector that would take five seconds and a 20 ms budget
    const stuck = detector("stuck", async (_model, context) => {
      await sleep(5_000, context);
      return [finding(1)];
    });
    const quick = detector("quick", () => [finding(2)]);
    const pipeline = new DetectorPipeline([stuck, quick], {
      maxConcurrency: 2,
      timeoutMs: 5_000,
      detectorTimeoutMs: 20,
    });

    // When: Running
    const result = await pipeline.run(model, services(model));

    // Then: Timeout recorded, quick detector unaffected
    expect(result.runs.map((run) => run.status)).toEqual(["timeout", "completed"]);
    expect(result.diagnostics).toEqual([
      {
        code: "DETECTOR_TIMEOUT",
        message: "Detector stuck did not finish: Detector deadline of 20 ms exceeded",
        detector: "stuck",
      },
    ]);
  });

  it("should skip remaining detectors once the contract deadline passes", async () => {
    // Given: One worker, a stuck first detector and a 30 ms contract budget
    const stuck = detector("stuck", async (_model, context) => {
      await sleep(5_000, context);
      return [];
    });
    const never = vi.fn(() => [finding(2)]);
    const pipeline = new DetectorPipeline([stuck, detector("later", never)], { maxConcurrency: 1, timeoutMs: 30 });

    // When: Running
    const result = await pipeline.run(model, services(model));

    // Then: The second detector never runs
    expect(never).not.toHaveBeenCalled();
    expect(result.runs.map((run) => run.status)).toEqual(["timeout", "skipped"]);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["DETECTOR_TIMEOUT", "CONTRACT_TIMEOUT"]);
    expect(result.diagnostics[1]?.message).toBe("Analysis of Vault exceeded 30 ms; 2 detector(s) did not complete");
  });

  it("should time out a synchronous detector that overruns its budget", async () => {
    // Given: 30 ms of blocking work per function over five functions, a 50 ms budget
    const quick = detector("quick", () => [finding(2)]);
    const pipeline = new DetectorPipeline([new BusyDetector("busy", 30), quick], {
      maxConcurrency: 2,
      timeoutMs: 5_000,
      detectorTimeoutMs: 50,
    });

    // When: Running
    const result = await pipeline.run(fiveFunctions, services(fiveFunctions));

    // Then: The busy detector stops at its next function, the quick one completes
    expect(result.runs.map((run) => [run.detectorId, run.status, run.findings.length])).toEqual([
      ["busy", "timeout", 0],
      ["quick", "completed", 1],
    ]);
    expect(result.diagnostics).toEqual([
      {
        code: "DETECTOR_TIMEOUT",
        message: "Detector busy did not finish: Detector deadline of 50 ms exceeded",
        detector: "busy",
      },
    ]);
  });

  it("should enforce the contract deadline against synchronous detectors", async () => {
    // Given: One worker, a blocking detector and a 50 ms contract budget
    const never = vi.fn(() => [finding(2)]);
    const pipeline = new DetectorPipeline([new BusyDetector("busy", 30), detector("later", never)], {
      maxConcurrency: 1,
      timeoutMs: 50,
    });

    // When: Running
    const result = await pipeline.run(fiveFunctions, services(fiveFunctions));

    // Then: The busy detector times out and the next one is skipped
    expect(never).not.toHaveBeenCalled();
    expect(result.runs.map((run) => run.status)).toEqual(["timeout", "skipped"]);
    expect(result.runs[0]?.error).toBe("Contract deadline of 50 ms exceeded");
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["DETECTOR_TIMEOUT", "CONTRACT_TIMEOUT"]);
  });

  it("should drop the findings of a detector that returns after its deadline", async () => {
    // Given: A detector with no checkpoints that blocks past a 20 ms budget
    const blocking = detector("blocking", () => {
      const until = Date.now() + 40;
      while (Date.now() < until) {
        // spin
      }
      return [finding(1)];
    });
    const pipeline = new DetectorPipeline([blocking], { maxConcurrency: 1, timeoutMs: 5_000, detectorTimeoutMs: 20 });

    // When: Running
    const result = await pipeline.run(model, services(model));

    // Then: Timed out on return
    expect(result.runs[0]).toMatchObject({ status: "timeout", findings: [] });
  });

  // ==========================================================================
  // Progress
  // ==========================================================================

  it("should report progress and survive a throwing callback", async () => {
    // Given: A recording callback on a sequential pipeline
    const events: DetectorProgress[] = [];
    const pipeline = new DetectorPipeline(
      [detector("a", () => [finding(1)]), detector("b", () => [])],
      { maxConcurrency: 1, timeoutMs: 5_000 }
    ).onProgress((progress) => {
      events.push(progress);
      throw new Error("callback failure");
    });

    // When: Running
    const result = await pipeline.run(model, services(model));

    // Then: Start and completion per detector, analysis unaffected
    expect(events).toEqual([
      { detectorId: "a", status: "started" },
      { detectorId: "a", status: "completed", findings: 1 },
      { detectorId: "b", status: "started" },
      { detectorId: "b", status: "completed", findings: 0 },
    ]);
    expect(result.runs.every((run) => run.status === "completed")).toBe(true);
  });
});
