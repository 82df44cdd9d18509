import fs from "node:fs";
import path from "node:path";
import { GitOperations } from "../git/operations.js";
import { ConfigurationError, DeployError, SynchronizationError, errorMessage } from "../core/errors.js";
import type { Reporter } from "../log/reporter.js";
import type { RepositorySpec, SyncMode } from "../types/config.js";
import type { ResolvedRevision } from "../types/revision.js";

export type SyncOptions = {
  rootDir: string;
  buildDir: string;
  onlyTags: boolean;
  gitTimeoutMs?: number;
  /** Absolute paths a previous run stamped; restored before the pull. */
  restore?: readonly string[];
  signal?: AbortSignal;
  reporter: Reporter;
};

export type SyncOutcome =
  | { ok: true; repository: string; revision: ResolvedRevision }
  | { ok: false; repository: string; error: DeployError };

/** Absolute checkout path; `${build_dir}` expands to the resolved build directory. */
export function resolveRepoPath(spec: Pick<RepositorySpec, "path">, rootDir: string, buildDir: string): string {
  return path.resolve(rootDir, spec.path.split("${build_dir}").join(buildDir));
}

export function effectiveMode(spec: Pick<RepositorySpec, "mode">, onlyTags: boolean): SyncMode {
  return spec.mode ?? (onlyTags ? "latest-tag" : "latest-commit");
}

/** Entries of `files` inside `repoPath`, as repository-relative paths. */
function filesWithin(repoPath: string, files: readonly string[]): string[] {
  return files
    .map((file) => path.relative(repoPath, file))
    .filter((rel) => rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel))
    .map((rel) => rel.split(path.sep).join("/"));
}

async function step<T>(code: string, what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof DeployError) throw e;
    throw new SynchronizationError(code, `${what}: ${errorMessage(e)}`, e);
  }
}

/**
 * Bring one checkout to its target revision.
 *
 * latest-tag: hard reset, pull, check out the most recent reachable tag.
 * latest-commit: pull (local conflicts fail), check out the tag at HEAD or the short hash.
 * Files a previous run stamped are restored first so their placeholders come back;
 * other local edits are kept. Leaves the working tree on a detached HEAD.
 */
export async function synchronizeRepository(spec: RepositorySpec, opts: SyncOptions): Promise<ResolvedRevision> {
  const repoPath = resolveRepoPath(spec, opts.rootDir, opts.buildDir);
  const mode = effectiveMode(spec, opts.onlyTags);
  const log = opts.reporter;
  const stage = `sync:${spec.name}`;

  if (!fs.existsSync(repoPath)) {
    if (spec.required) {
      throw new ConfigurationError("REPO_MISSING", `${spec.name}: ${repoPath} does not exist or is not a git repository`);
    }
    if (!spec.remote) {
      throw new ConfigurationError("REPO_MISSING", `${spec.name}: ${repoPath} does not exist and no remote is configured`);
    }
    log.info("REPO_CLONE", `cloning ${spec.remote}`, { stage, path: repoPath });
    const remote = spec.remote;
    await step("CLONE_FAILED", `${spec.name}: clone failed`, () =>
      GitOperations.clone(remote, repoPath, { timeoutMs: opts.gitTimeoutMs, signal: opts.signal }),
    );
  }

  const git = new GitOperations(repoPath, { timeoutMs: opts.gitTimeoutMs, signal: opts.signal });
  const isRepo = await step("GIT_FAILED", `${spec.name}: git unavailable`, () => git.isRepoRoot());
  if (!isRepo) {
    throw new ConfigurationError("REPO_NOT_GIT", `${spec.name}: ${repoPath} does not exist or is not a git repository`);
  }

  log.info("REPO_UPDATE", `updating ${spec.name} (${mode})`, { stage, path: repoPath });

  const stamped = filesWithin(repoPath, opts.restore ?? []);
  if (stamped.length > 0) {
    const modified = new Set(await step("GIT_FAILED", `${spec.name}: cannot list changes`, () => git.modifiedFiles()));
    const restore = stamped.filter((file) => modified.has(file));
    if (restore.length > 0) {
      log.info("STAMP_RESTORED", `restoring ${restore.length} stamped file(s)`, { stage, details: { files: restore } });
      await step("RESTORE_FAILED", `${spec.name}: cannot restore stamped files`, () => git.restoreFiles(restore));
    }
  }

  if (mode === "latest-tag") {
    await step("RESET_FAILED", `${spec.name}: reset failed`, () => git.resetHard());
  }

  // A previous run leaves HEAD detached at the deployed revision; pull needs the branch.
  if (await step("GIT_FAILED", `${spec.name}: cannot read HEAD`, () => git.isDetached())) {
    const branch = await step("GIT_FAILED", `${spec.name}: cannot find default branch`, () => git.defaultBranch());
    if (!branch) {
      throw new SynchronizationError("NO_DEFAULT_BRANCH", `${spec.name}: HEAD is detached and no default branch was found`);
    }
    await step("CHECKOUT_FAILED", `${spec.name}: cannot switch to ${branch}`, () => git.checkoutBranch(branch));
  }

  if (await step("GIT_FAILED", `${spec.name}: cannot read upstream`, () => git.hasUpstream())) {
    await step("PULL_FAILED", `${spec.name}: pull failed`, () => git.pull());
  } else {
    log.warn("NO_UPSTREAM", `${spec.name}: no upstream branch, skipping pull`, { stage });
  }

  const revision =
    mode === "latest-tag"
      ? await step("NO_TAG", `${spec.name}: no tag reachable`, () => git.latestTag())
      : await step("DESCRIBE_FAILED", `${spec.name}: cannot resolve HEAD`, () => git.revisionAtHead());

  log.info("REPO_CHECKOUT", `checking out ${spec.name} ${revision}`, { stage });
  await step("CHECKOUT_FAILED", `${spec.name}: checkout of ${revision} failed`, () => git.checkoutDetached(revision));

  const info = await step("GIT_FAILED", `${spec.name}: cannot read commit`, () => git.headCommitInfo());
  return Object.freeze({ repository: spec.name, revision, ...info });
}

/**
 * Synchronize every repository in order. A synchronization failure is
 * recorded and the next repository is attempted; configuration errors abort.
 */
export async function synchronizeAll(specs: RepositorySpec[], opts: SyncOptions): Promise<SyncOutcome[]> {
  const outcomes: SyncOutcome[] = [];
  for (const spec of specs) {
    if (opts.signal?.aborted) break;
    try {
      const revision = await synchronizeRepository(spec, opts);
      outcomes.push({ ok: true, repository: spec.name, revision });
    } catch (e) {
      if (e instanceof ConfigurationError) throw e;
      const error = e instanceof DeployError ? e : new SynchronizationError("SYNC_FAILED", errorMessage(e), e);
      opts.reporter.error(error.code, error.message, { stage: `sync:${spec.name}` });
      outcomes.push({ ok: false, repository: spec.name, error });
    }
  }
  return outcomes;
}
