import path from "node:path";
import type { Credentials, Settings } from "../config/settings.js";
import type { Reporter } from "../log/reporter.js";
import type { ProcessRunner } from "./process.js";
import type { RedeployConfig, RepositorySpec } from "../types/config.js";
import type { ResolvedRevision } from "../types/revision.js";

/** Everything a stage may read. Built once per run; nothing reads process.env after this. */
export type DeployContext = {
  config: RedeployConfig;
  rootDir: string;
  /** Absolute. */
  buildDir: string;
  onlyTags: boolean;
  target?: string;
  credentials: Credentials;
  reporter: Reporter;
  runner?: ProcessRunner;
  /** Filled by the sync stage. */
  revisions: Map<string, ResolvedRevision>;
  /** Absolute paths the last stamp stage rewrote; sync restores them before pulling. */
  stampedFiles: string[];
};

export type ContextOverrides = {
  buildDir?: string;
  onlyTags?: boolean;
  target?: string;
};

/**
 * Precedence: CLI flag ← settings file (or exported variable) ← config.
 * `root_dir` is relative to the directory holding the config directory.
 */
export function buildContext(opts: {
  config: RedeployConfig;
  configDir: string;
  settings: Settings;
  overrides?: ContextOverrides;
  reporter: Reporter;
  runner?: ProcessRunner;
}): DeployContext {
  const { config, settings, overrides = {} } = opts;
  const rootDir = path.resolve(path.dirname(path.resolve(opts.configDir)), config.root_dir);
  const buildDirRaw = overrides.buildDir ?? settings.buildDir ?? config.build_dir;

  opts.reporter.addSecret(settings.credentials.password);

  const ctx: DeployContext = {
    config,
    rootDir,
    buildDir: path.resolve(rootDir, buildDirRaw),
    onlyTags: overrides.onlyTags ?? settings.onlyTags ?? config.only_tags,
    credentials: settings.credentials,
    reporter: opts.reporter,
    revisions: new Map(),
    stampedFiles: [],
  };
  if (overrides.target !== undefined) ctx.target = overrides.target;
  if (opts.runner) ctx.runner = opts.runner;
  return ctx;
}

export function findRepository(ctx: DeployContext, name: string): RepositorySpec | undefined {
  return ctx.config.repositories.find((r) => r.name === name);
}
