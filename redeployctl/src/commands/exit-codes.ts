import type { RunRecord } from "../core/pipeline.js";
import { STAGE_IDS, type StageId } from "../core/stages.js";

/**
 * CLI exit codes, one per failing stage.
 */
export const EXIT = {
  SUCCESS: 0,
  CONFIG_ERROR: 2,
  LOCKED: 3,
  SYNC_FAILED: 10,
  ASSETS_FAILED: 11,
  STAMP_FAILED: 12,
  PROVENANCE_FAILED: 13,
  ENGINE_FAILED: 20,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const STAGE_EXIT: Record<StageId, ExitCode> = {
  sync: EXIT.SYNC_FAILED,
  assets: EXIT.ASSETS_FAILED,
  stamp: EXIT.STAMP_FAILED,
  provenance: EXIT.PROVENANCE_FAILED,
  batch: EXIT.ENGINE_FAILED,
};

/** Exit code of the first failed stage in pipeline order; configuration errors win. */
export function exitCodeFor(record: RunRecord): ExitCode {
  const failed = STAGE_IDS.filter((id) => ["failed", "timeout"].includes(record.stages[id].status));
  if (failed.some((id) => record.stages[id].error?.kind === "configuration")) return EXIT.CONFIG_ERROR;
  const first = failed[0];
  return first ? STAGE_EXIT[first] : EXIT.SUCCESS;
}
