/**
 * Detector Pipeline
 *
 * Fans a contract model out to its detectors with:
 * - Bounded concurrency (worker pool)
 * - A deadline per detector and one for the whole contract
 * - Failure isolation: a throwing or slow detector costs only its own findings
 *
 * Results are collected by detector index, so completion order never changes
 * what the caller sees.
 */

import type { AnalysisOptions } from "../config/schema.js";
import type { InstructionCostTable } from "../gas/costTable.js";
import type {
  ContractModel,
  CostReport,
  Detector,
  DetectorContext,
  DetectorRunResult,
  Diagnostic,
} from "../types/index.js";
import { runWithConcurrency } from "../utils/concurrency.js";
import { logger } from "../utils/logger.js";

const log = logger.child({ component: "pipeline" });

// ============================================================================
// Types
// ============================================================================

export type PipelineOptions = Pick<AnalysisOptions, "maxConcurrency" | "timeoutMs" | "detectorTimeoutMs">;

/** Shared, read-only inputs handed to every detector. */
export interface PipelineServices {
  config: AnalysisOptions;
  costs: CostReport;
  costTable: InstructionCostTable;
}

export interface PipelineResult {
  /** One entry per detector, in detector order */
  runs: DetectorRunResult[];
  diagnostics: Diagnostic[];
}

export type DetectorProgress = {
  detectorId: string;
  status: "started" | DetectorRunResult["status"];
  findings?: number;
  error?: string;
};

export type ProgressCallback = (progress: DetectorProgress) => void;

interface ContractBudget {
  controller: AbortController;
  /** Epoch milliseconds */
  deadline: number;
}

/** Abort reason recorded when a deadline passes. */
export class DeadlineExceededError extends Error {
  constructor(
    readonly scope: "detector" | "contract",
    readonly timeoutMs: number
  ) {
    super(`${scope === "detector" ? "Detector" : "Contract"} deadline of ${timeoutMs} ms exceeded`);
    this.name = "DeadlineExceededError";
  }
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * @example
 * ```ts
 * const pipeline = new DetectorPipeline(DEFAULT_DETECTORS, { maxConcurrency: 4, timeoutMs: 30_000 });
 * const { runs, diagnostics } = await pipeline.run(model, { config, costs, costTable });
 * ```
 */
export class DetectorPipeline {
  private progressCallback?: ProgressCallback;

  constructor(
    private readonly detectors: readonly Detector[],
    private readonly options: PipelineOptions
  ) {}

  /**
   * Set the progress callback for status updates.
   */
  onProgress(callback: ProgressCallback): this {
    this.progressCallback = callback;
    return this;
  }

  async run(model: ContractModel, services: PipelineServices): Promise<PipelineResult> {
    const budget: ContractBudget = {
      controller: new AbortController(),
      deadline: Date.now() + this.options.timeoutMs,
    };
    const contract = budget.controller;
    const contractTimer = setTimeout(() => this.expire(budget, true), this.options.timeoutMs);

    log.debug("Running detectors", {
      contract: model.name,
      detectors: this.detectors.map((detector) => detector.id),
    });

    let runs: DetectorRunResult[];
    try {
      runs = await runWithConcurrency(
        this.detectors,
        (detector) => this.runDetector(detector, model, services, budget),
        this.options.maxConcurrency
      );
    } finally {
      clearTimeout(contractTimer);
    }

    const diagnostics: Diagnostic[] = [];
    for (const result of runs) {
      if (result.status === "failed") {
        diagnostics.push({
          code: "DETECTOR_FAILED",
          message: `Detector ${result.detectorId} failed: ${result.error ?? "unknown error"}`,
          detector: result.detectorId,
        });
      } else if (result.status === "timeout") {
        diagnostics.push({
          code: "DETECTOR_TIMEOUT",
          message: `Detector ${result.detectorId} did not finish: ${result.error ?? "deadline exceeded"}`,
          detector: result.detectorId,
        });
      }
    }

    const unfinished = runs.filter((result) => result.status === "skipped" || result.status === "timeout");
    if (contract.signal.aborted && unfinished.length > 0) {
      diagnostics.push({
        code: "CONTRACT_TIMEOUT",
        message: `Analysis of ${model.name} exceeded ${this.options.timeoutMs} ms; ${unfinished.length} detector(s) did not complete`,
      });
      log.warn("Contract analysis timed out", { contract: model.name, unfinished: unfinished.length });
    }

    return { runs, diagnostics };
  }

  // -------------------------------------------------------------------------
  // Single detector
  // -------------------------------------------------------------------------

  private async runDetector(
    detector: Detector,
    model: ContractModel,
    services: PipelineServices,
    budget: ContractBudget
  ): Promise<DetectorRunResult> {
    const contractSignal = budget.controller.signal;
    this.expire(budget);
    if (contractSignal.aborted) {
      this.notifyProgress({ detectorId: detector.id, status: "skipped" });
      return { detectorId: detector.id, status: "skipped", findings: [], durationMs: 0 };
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(contractSignal.reason);
    contractSignal.addEventListener("abort", forwardAbort, { once: true });

    const timeoutMs = this.options.detectorTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => controller.abort(new DeadlineExceededError("detector", timeoutMs)), timeoutMs);
      }
    });

    let startTime = Date.now();

    // Timers cannot fire while a synchronous detector holds the thread, so the
    // checkpoint compares against the clock itself.
    const checkpoint = (): void => {
      this.expire(budget);
      if (timeoutMs !== undefined && !controller.signal.aborted && Date.now() - startTime >= timeoutMs) {
        controller.abort(new DeadlineExceededError("detector", timeoutMs));
      }
      controller.signal.throwIfAborted();
    };

    const context: DetectorContext = {
      ...services,
      signal: controller.signal,
      throwIfAborted: checkpoint,
    };

    this.notifyProgress({ detectorId: detector.id, status: "started" });

    try {
      const inspection = Promise.resolve()
        .then(() => {
          startTime = Date.now();
          return detector.inspect(model, context);
        })
        .then((findings) => {
          checkpoint();
          return findings;
        });
      const findings = await Promise.race([inspection, deadline]);
      this.notifyProgress({ detectorId: detector.id, status: "completed", findings: findings.length });
      return { detectorId: detector.id, status: "completed", findings, durationMs: Date.now() - startTime };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const status = controller.signal.aborted ? "timeout" : "failed";
      log.warn(status === "timeout" ? "Detector timed out" : "Detector failed", {
        detector: detector.id,
        error: message,
      });
      this.notifyProgress({ detectorId: detector.id, status, error: message });
      return { detectorId: detector.id, status, findings: [], durationMs: Date.now() - startTime, error: message };
    } finally {
      clearTimeout(timer);
      contractSignal.removeEventListener("abort", forwardAbort);
    }
  }

  /** Abort the contract once its deadline has passed, or unconditionally when `force` is set. */
  private expire(budget: ContractBudget, force = false): void {
    if (budget.controller.signal.aborted) return;
    if (force || Date.now() >= budget.deadline) {
      budget.controller.abort(new DeadlineExceededError("contract", this.options.timeoutMs));
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  /**
   * Notify progress callback if set.
   */
  private notifyProgress(progress: DetectorProgress): void {
    if (this.progressCallback) {
      try {
        this.progressCallback(progress);
      } catch (error) {
        log.warn("Progress callback error", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
