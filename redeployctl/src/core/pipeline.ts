import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { DeployError, errorMessage, type DeployErrorKind } from "./errors.js";
import { DEFAULT_STAGES, STAGE_IDS, type StageDefinition, type StageId, type StageOutput } from "./stages.js";
import type { DeployContext } from "./context.js";
import type { ResolvedRevision } from "../types/revision.js";

export type StageStatus = "pending" | "running" | "succeeded" | "failed" | "timeout" | "blocked" | "skipped";

export type StageResult = {
  status: StageStatus;
  duration_ms?: number;
  reason?: string;
  error?: { kind: DeployErrorKind | "internal"; code: string; message: string };
  details?: Record<string, unknown>;
};

export type RunStatus = "running" | "succeeded" | "failed";

/** Persistent run record stored in {runs_dir}/{runId}/state.json */
export type RunRecord = {
  run_id: string;
  status: RunStatus;
  started_at: string;
  updated_at: string;
  finished_at: string | null;
  only_tags: boolean;
  build_dir: string;
  target: string | null;
  stages: Record<StageId, StageResult>;
  revisions: Record<string, ResolvedRevision>;
};

function nowIso(): string {
  return new Date().toISOString();
}

export function makeRunId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

export function statePathForRun(runsDir: string, runId: string): string {
  return path.join(runsDir, runId, "state.json");
}

export function saveRecord(statePath: string, record: RunRecord): void {
  fs.mkdirSync(path.dirname(statePath), { recursive: true });
  fs.writeFileSync(statePath, JSON.stringify(record, null, 2) + "\n", "utf8");
}

type TimedOut = { timedOut: true };

async function withTimeout<T>(work: Promise<T>, ms: number): Promise<T | TimedOut> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<TimedOut>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function isTimedOut(value: unknown): value is TimedOut {
  return typeof value === "object" && value !== null && "timedOut" in value && value.timedOut === true;
}

/**
 * Pipeline — runs the stages in order against one DeployContext.
 *
 * A stage whose repositories or prerequisite stages did not succeed is
 * `blocked`; independent stages still run. A configuration error anywhere
 * stops the run. The record is persisted after every stage.
 */
export class Pipeline {
  private readonly stages: readonly StageDefinition[];
  private readonly skip: Set<StageId>;

  constructor(
    private readonly ctx: DeployContext,
    opts: { stages?: readonly StageDefinition[]; skip?: readonly StageId[] } = {},
  ) {
    this.stages = opts.stages ?? DEFAULT_STAGES;
    this.skip = new Set(opts.skip ?? []);
  }

  async run(opts: { runId?: string; runsDir?: string } = {}): Promise<RunRecord> {
    const runId = opts.runId ?? makeRunId();
    const statePath = opts.runsDir ? statePathForRun(opts.runsDir, runId) : null;
    const stageTimeoutMs = this.ctx.config.timeouts.stage_s * 1000;

    const stages: Record<StageId, StageResult> = {
      sync: { status: "pending" },
      assets: { status: "pending" },
      stamp: { status: "pending" },
      provenance: { status: "pending" },
      batch: { status: "pending" },
    };
    const record: RunRecord = {
      run_id: runId,
      status: "running",
      started_at: nowIso(),
      updated_at: nowIso(),
      finished_at: null,
      only_tags: this.ctx.onlyTags,
      build_dir: this.ctx.buildDir,
      target: this.ctx.target ?? null,
      stages,
      revisions: {},
    };
    const persist = () => {
      record.updated_at = nowIso();
      record.revisions = Object.fromEntries(this.ctx.revisions);
      if (statePath) saveRecord(statePath, record);
    };
    persist();

    let aborted = false;
    for (const stage of this.stages) {
      const result = record.stages[stage.id];
      if (aborted) {
        result.status = "blocked";
        result.reason = "run aborted by a configuration error";
        continue;
      }

      const skipReason = this.skip.has(stage.id) ? "skipped on request" : (stage.skipReason?.(this.ctx) ?? null);
      if (skipReason) {
        result.status = "skipped";
        result.reason = skipReason;
        this.ctx.reporter.info("STAGE_SKIPPED", `${stage.id}: ${skipReason}`, { stage: stage.id });
        persist();
        continue;
      }

      const blockedBy = this.blockers(stage, record);
      if (blockedBy.length > 0) {
        result.status = "blocked";
        result.reason = `waiting on ${blockedBy.join(", ")}`;
        this.ctx.reporter.warn("STAGE_BLOCKED", `${stage.id}: ${result.reason}`, { stage: stage.id });
        persist();
        continue;
      }

      result.status = "running";
      persist();
      const started = Date.now();

      const controller = new AbortController();
      const work = Promise.resolve().then(() => stage.run(this.ctx, controller.signal));
      const timeoutError = {
        kind: "internal" as const,
        code: "STAGE_TIMEOUT",
        message: `${stage.id} exceeded ${this.ctx.config.timeouts.stage_s}s`,
      };

      try {
        const out = await withTimeout(work, stageTimeoutMs);
        result.duration_ms = Date.now() - started;
        if (isTimedOut(out)) {
          result.status = "timeout";
          result.error = timeoutError;
          controller.abort();
          await this.settle(stage.id, work);
        } else if (result.duration_ms > stageTimeoutMs) {
          // Synchronous work holds the event loop, so the timer could not fire.
          result.status = "timeout";
          result.error = timeoutError;
        } else if (out.failed) {
          result.status = "failed";
          result.error = { ...out.failed };
          result.details = out.details;
        } else {
          result.status = "succeeded";
          result.details = out.details;
        }
      } catch (e) {
        result.duration_ms = Date.now() - started;
        result.status = "failed";
        result.error =
          e instanceof DeployError
            ? { kind: e.kind, code: e.code, message: e.message }
            : { kind: "internal", code: "STAGE_ERROR", message: errorMessage(e) };
        if (e instanceof DeployError && e.kind === "configuration") aborted = true;
      }

      if (result.error) {
        this.ctx.reporter.error(result.error.code, result.error.message, { stage: stage.id });
      }
      persist();
    }

    const ok = STAGE_IDS.every((id) => ["succeeded", "skipped"].includes(record.stages[id].status));
    record.status = ok ? "succeeded" : "failed";
    record.finished_at = nowIso();
    persist();
    return record;
  }

  /**
   * Wait for a stage that timed out. Its git or engine processes are killed
   * through the signal; the run (and so the lock) ends only once it stops.
   */
  private async settle(id: StageId, work: Promise<StageOutput>): Promise<void> {
    this.ctx.reporter.warn("STAGE_CANCELLING", `${id}: waiting for the stage to stop`, { stage: id });
    try {
      await work;
    } catch (e) {
      this.ctx.reporter.warn("STAGE_CANCELLED", `${id}: ${errorMessage(e)}`, { stage: id });
    }
  }

  private blockers(stage: StageDefinition, record: RunRecord): string[] {
    const out: string[] = [];
    for (const dep of stage.needsStages) {
      const status = record.stages[dep].status;
      if (status !== "succeeded" && status !== "skipped" && !(dep === "sync" && status === "failed")) {
        out.push(`stage ${dep}`);
      }
    }
    for (const repo of stage.needsRepositories(this.ctx)) {
      if (!this.ctx.revisions.has(repo)) out.push(`repository ${repo}`);
    }
    return out;
  }
}
