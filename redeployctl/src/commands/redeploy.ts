import path from "node:path";
import { buildContext, type ContextOverrides } from "../core/context.js";
import { errorMessage, isDeployError } from "../core/errors.js";
import { acquireRunLock, RunLockedError } from "../core/lock.js";
import { Pipeline, type RunRecord } from "../core/pipeline.js";
import type { ProcessRunner } from "../core/process.js";
import type { StageDefinition, StageId } from "../core/stages.js";
import type { Reporter } from "../log/reporter.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";
import { lastStampedFiles } from "./status.js";
import { loadInputs, type InputOptions } from "./setup.js";

export type RedeployOpts = InputOptions & {
  overrides?: ContextOverrides;
  runsDir?: string;
  skip?: StageId[];
  reporter: Reporter;
  /** Test seams. */
  runner?: ProcessRunner;
  stages?: readonly StageDefinition[];
};

export type RedeployResult =
  | { ok: true; exitCode: ExitCode; record: RunRecord }
  | { ok: false; exitCode: ExitCode; record?: RunRecord; error: { code: string; message: string } };

export async function redeploy(opts: RedeployOpts): Promise<RedeployResult> {
  const log = opts.reporter;

  let inputs: ReturnType<typeof loadInputs>;
  try {
    inputs = loadInputs(opts);
  } catch (e) {
    const code = isDeployError(e) ? e.code : "CONFIG_ERROR";
    log.error(code, errorMessage(e));
    return { ok: false, exitCode: EXIT.CONFIG_ERROR, error: { code, message: errorMessage(e) } };
  }

  const ctx = buildContext({
    config: inputs.config,
    configDir: opts.configDir,
    settings: inputs.settings,
    overrides: opts.overrides,
    reporter: log,
    runner: opts.runner,
  });

  let release: () => void;
  try {
    release = acquireRunLock(path.resolve(ctx.rootDir, ctx.config.lock_file), { reporter: log });
  } catch (e) {
    if (e instanceof RunLockedError) {
      log.error("LOCKED", e.message);
      return { ok: false, exitCode: EXIT.LOCKED, error: { code: "LOCKED", message: e.message } };
    }
    throw e;
  }

  try {
    log.info("RUN_START", `redeploying into ${ctx.buildDir} (${ctx.onlyTags ? "tags only" : "latest commits"})`);
    const runsDir = opts.runsDir ? path.resolve(opts.runsDir) : path.resolve(ctx.rootDir, ctx.config.runs_dir);
    ctx.stampedFiles = lastStampedFiles(runsDir);
    const pipeline = new Pipeline(ctx, { stages: opts.stages, skip: opts.skip });
    const record = await pipeline.run({ runsDir });

    const exitCode = exitCodeFor(record);
    if (exitCode === EXIT.SUCCESS) {
      log.info("RUN_OK", `run ${record.run_id} finished`);
      return { ok: true, exitCode, record };
    }

    const failed = Object.entries(record.stages).find(([, s]) => s.status === "failed" || s.status === "timeout");
    const error = failed?.[1].error ?? { code: "RUN_FAILED", message: `run ${record.run_id} failed` };
    return { ok: false, exitCode, record, error: { code: error.code, message: error.message } };
  } finally {
    release();
  }
}
