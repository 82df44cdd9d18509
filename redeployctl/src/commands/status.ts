import fs from "node:fs";
import path from "node:path";
import type { RunRecord } from "../core/pipeline.js";

export type StatusResult =
  | { ok: true; record: RunRecord }
  | { ok: false; error: string };

function isRunRecord(value: unknown): value is RunRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "run_id" in value &&
    typeof value.run_id === "string" &&
    "stages" in value &&
    typeof value.stages === "object"
  );
}

/**
 * Read the record of one run.
 */
export function status(opts: { runsDir: string; runId: string }): StatusResult {
  const statePath = path.join(opts.runsDir, opts.runId, "state.json");

  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No run found: ${opts.runId}` };
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(statePath, "utf8"));
    if (!isRunRecord(parsed)) return { ok: false, error: `Not a run record: ${statePath}` };
    return { ok: true, record: parsed };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${e instanceof Error ? e.message : String(e)}` };
  }
}

export type RunSummary = { id: string; status: string; updated_at: string };

/**
 * List all runs, most recent first.
 */
export function listRuns(runsDir: string): RunSummary[] {
  if (!fs.existsSync(runsDir)) return [];

  const results: RunSummary[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const res = status({ runsDir, runId: entry.name });
    if (res.ok) {
      results.push({ id: entry.name, status: res.record.status, updated_at: res.record.updated_at });
    } else if (fs.existsSync(path.join(runsDir, entry.name, "state.json"))) {
      results.push({ id: entry.name, status: "corrupted", updated_at: "" });
    }
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}

/**
 * Absolute paths rewritten by the most recent run whose stamp stage
 * succeeded; empty when no run has stamped anything yet.
 */
export function lastStampedFiles(runsDir: string): string[] {
  for (const run of listRuns(runsDir)) {
    const res = status({ runsDir, runId: run.id });
    if (!res.ok) continue;
    const stamp = res.record.stages.stamp;
    const files = stamp?.status === "succeeded" ? stamp.details?.files : undefined;
    if (!Array.isArray(files)) continue;
    const buildDir = res.record.build_dir;
    return files.filter((f: unknown): f is string => typeof f === "string").map((f) => path.resolve(buildDir, f));
  }
  return [];
}
