import path from "node:path";
import { propagateAssets } from "../assets/propagator.js";
import { runBatchScripts } from "../batch/runner.js";
import { annotateRepository } from "../provenance/annotator.js";
import { stampVersions } from "../stamp/version-stamper.js";
import { effectiveMode, resolveRepoPath, synchronizeAll } from "../sync/synchronizer.js";
import { ConfigurationError, type DeployErrorKind } from "./errors.js";
import { findRepository, type DeployContext } from "./context.js";
import type { RepositorySpec } from "../types/config.js";

export const STAGE_IDS = ["sync", "assets", "stamp", "provenance", "batch"] as const;

export type StageId = (typeof STAGE_IDS)[number];

export type StageOutput = {
  /** Set when the stage ran but only partly succeeded (e.g. one repository failed). */
  failed?: { kind: DeployErrorKind; code: string; message: string };
  details?: Record<string, unknown>;
};

export type StageDefinition = {
  id: StageId;
  /** Repositories that must have synchronized for the stage to run. */
  needsRepositories: (ctx: DeployContext) => string[];
  needsStages: StageId[];
  /** Reason the stage does not apply to this run, or null. */
  skipReason?: (ctx: DeployContext) => string | null;
  /** `signal` aborts once the stage has exceeded its time limit. */
  run: (ctx: DeployContext, signal: AbortSignal) => Promise<StageOutput>;
};

function repository(ctx: DeployContext, name: string, usedBy: string): RepositorySpec {
  const spec = findRepository(ctx, name);
  if (!spec) {
    throw new ConfigurationError("REPO_UNKNOWN", `${usedBy} refers to unknown repository "${name}"`);
  }
  return spec;
}

function webappRepositories(ctx: DeployContext): string[] {
  return ctx.config.repositories.filter((r) => r.role === "webapp").map((r) => r.name);
}

function repoPath(ctx: DeployContext, spec: RepositorySpec): string {
  return resolveRepoPath(spec, ctx.rootDir, ctx.buildDir);
}

const sync: StageDefinition = {
  id: "sync",
  needsRepositories: () => [],
  needsStages: [],
  run: async (ctx, signal) => {
    const outcomes = await synchronizeAll(ctx.config.repositories, {
      rootDir: ctx.rootDir,
      buildDir: ctx.buildDir,
      onlyTags: ctx.onlyTags,
      gitTimeoutMs: ctx.config.timeouts.git_s * 1000,
      restore: ctx.stampedFiles,
      signal,
      reporter: ctx.reporter,
    });

    const failed: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) ctx.revisions.set(outcome.repository, outcome.revision);
      else failed.push(`${outcome.repository}: ${outcome.error.message}`);
    }

    const details = { revisions: Object.fromEntries([...ctx.revisions].map(([k, v]) => [k, v.revision])) };
    if (failed.length === 0) return { details };
    return { failed: { kind: "synchronization", code: "SYNC_FAILED", message: failed.join("; ") }, details };
  },
};

const assets: StageDefinition = {
  id: "assets",
  needsRepositories: (ctx) => [ctx.config.assets.repository, ...webappRepositories(ctx)],
  needsStages: ["sync"],
  run: async (ctx) => {
    const spec = repository(ctx, ctx.config.assets.repository, "assets");
    ctx.reporter.info("ASSETS_START", `copying image files from ${spec.name} to the web application`, { stage: "assets" });
    const res = propagateAssets({
      repoPath: repoPath(ctx, spec),
      datasetPattern: ctx.config.assets.dataset_pattern,
      extensions: ctx.config.assets.extensions,
      destination: path.resolve(ctx.buildDir, ctx.config.assets.destination),
      reporter: ctx.reporter,
    });
    return { details: { datasets: res.datasets, copied: res.copied.length, failures: res.failures } };
  },
};

const stamp: StageDefinition = {
  id: "stamp",
  needsRepositories: (ctx) => [...new Set([...Object.values(ctx.config.stamp.tokens), ...webappRepositories(ctx)])],
  needsStages: ["sync"],
  run: async (ctx) => {
    const tokens: Record<string, string> = {};
    for (const [placeholder, repo] of Object.entries(ctx.config.stamp.tokens)) {
      const revision = ctx.revisions.get(repo);
      if (!revision) throw new ConfigurationError("STAMP_NO_REVISION", `no revision resolved for ${repo} (${placeholder})`);
      tokens[placeholder] = revision.revision;
    }
    const res = stampVersions({
      root: ctx.buildDir,
      tokens,
      include: ctx.config.stamp.include,
      exclude: ctx.config.stamp.exclude,
    });
    ctx.reporter.info("STAMPED", `stamped ${res.files.length} file(s), ${res.replacements} replacement(s)`, { stage: "stamp" });
    return { details: { files: res.files, replacements: res.replacements, tokens } };
  },
};

const provenance: StageDefinition = {
  id: "provenance",
  needsRepositories: (ctx) => [ctx.config.provenance.repository],
  needsStages: ["sync"],
  skipReason: (ctx) => {
    const spec = findRepository(ctx, ctx.config.provenance.repository);
    return spec && effectiveMode(spec, ctx.onlyTags) === "latest-tag" ? null : "only runs in tag-only mode";
  },
  run: async (ctx) => {
    const spec = repository(ctx, ctx.config.provenance.repository, "provenance");
    const revision = ctx.revisions.get(spec.name);
    if (!revision) throw new ConfigurationError("PROVENANCE_NO_REVISION", `no revision resolved for ${spec.name}`);
    const res = annotateRepository({
      repoPath: repoPath(ctx, spec),
      include: ctx.config.provenance.include,
      revision,
      headerElement: ctx.config.provenance.header_element,
      reporter: ctx.reporter,
    });
    ctx.reporter.info("PROVENANCE_RECORDED", `recorded ${revision.revision} in ${res.annotated.length} document(s)`, {
      stage: "provenance",
    });
    return { details: { annotated: res.annotated.length, unchanged: res.unchanged.length, failures: res.failures } };
  },
};

const batch: StageDefinition = {
  id: "batch",
  needsRepositories: () => [],
  needsStages: ["assets", "stamp"],
  run: async (ctx, signal) => {
    const runs = await runBatchScripts(ctx.config.batch, {
      rootDir: ctx.rootDir,
      buildDir: ctx.buildDir,
      credentials: ctx.credentials,
      target: ctx.target,
      reporter: ctx.reporter,
      runner: ctx.runner,
      signal,
    });
    return { details: { scripts: runs.map((r) => ({ name: r.name, duration_ms: r.duration_ms, rewritten: r.rewritten })) } };
  },
};

export const DEFAULT_STAGES: readonly StageDefinition[] = [sync, assets, stamp, provenance, batch];
