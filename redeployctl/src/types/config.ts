/** Configuration types — layered config system (base.yaml ← env.yaml ← REDEPLOY_*). */
import type { DirectiveEntry } from "./directive.js";

export type SyncMode = "latest-commit" | "latest-tag";

export type RepositoryRole = "webapp" | "data";

export type RepositorySpec = {
  name: string;
  /** Local checkout, relative to root_dir. May contain `${build_dir}`. */
  path: string;
  remote?: string;
  role: RepositoryRole;
  /** Absent: follows the run-wide only_tags switch. */
  mode?: SyncMode;
  /** A missing checkout is a configuration error instead of a clone. */
  required?: boolean;
};

export type AssetCopySpec = {
  repository: string;
  dataset_pattern: string;
  extensions: string[];
  /** Relative to the build directory. */
  destination: string;
};

export type StampConfig = {
  include: string[];
  exclude: string[];
  /** Placeholder → name of the repository whose revision replaces it. */
  tokens: Record<string, string>;
};

export type ProvenanceConfig = {
  repository: string;
  include: string[];
  header_element: string;
};

export type BatchScriptConfig = {
  name: string;
  /** Script file, relative to root_dir. */
  file: string;
  /** Argument handed to the batch command; defaults to `file`. */
  invoke?: string;
  quiet?: boolean;
  rewrite?: { from: string; to: string };
  /** When present, `file` is (re)generated from these before the run. */
  directives?: DirectiveEntry[];
};

export type BatchConfig = {
  command: string;
  timeout_s: number;
  scripts: BatchScriptConfig[];
};

export type TimeoutsConfig = {
  git_s: number;
  stage_s: number;
};

export type RedeployConfig = {
  schema_version: string;
  root_dir: string;
  build_dir: string;
  only_tags: boolean;
  runs_dir: string;
  lock_file: string;
  repositories: RepositorySpec[];
  assets: AssetCopySpec;
  stamp: StampConfig;
  provenance: ProvenanceConfig;
  batch: BatchConfig;
  timeouts: TimeoutsConfig;
};
