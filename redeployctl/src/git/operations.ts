import { simpleGit, CheckRepoActions, type SimpleGit, type SimpleGitOptions } from "simple-git";

export type CommitInfo = {
  author: string;
  date: string;
  message: string;
};

/** Field separator for `git show --format`; cannot occur in names or dates. */
const SEP = "%x1f";

export type GitOptions = {
  /** Kills a git process that produces no output for this long. */
  timeoutMs?: number;
  /** Kills running git processes and fails later calls once aborted. */
  signal?: AbortSignal;
};

function clientOptions(opts: GitOptions): Partial<SimpleGitOptions> {
  return {
    timeout: opts.timeoutMs ? { block: opts.timeoutMs } : undefined,
    abort: opts.signal,
  };
}

/**
 * Git operations wrapper — abstracts simple-git for testability.
 * Every spawned git process is bounded by `timeoutMs` without output.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, opts: GitOptions & { git?: SimpleGit } = {}) {
    this.git = opts.git ?? simpleGit({ baseDir: repoPath, ...clientOptions(opts) });
  }

  /** Clone `remote` into `targetPath` (which must not exist yet). */
  static async clone(remote: string, targetPath: string, opts: GitOptions = {}): Promise<void> {
    await simpleGit(clientOptions(opts)).clone(remote, targetPath);
  }

  /** True when the path is the top level of a working tree. */
  async isRepoRoot(): Promise<boolean> {
    return this.git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
  }

  /** Discard local modifications to tracked files. */
  async resetHard(): Promise<void> {
    await this.git.reset(["--hard"]);
  }

  /** Tracked files with uncommitted changes, relative to the repository root. */
  async modifiedFiles(): Promise<string[]> {
    const out = await this.git.raw(["-c", "core.quotePath=false", "diff", "--name-only", "HEAD"]);
    return out.split("\n").filter((line) => line.length > 0);
  }

  /** Put the given tracked files back to their committed content. */
  async restoreFiles(paths: string[]): Promise<void> {
    await this.git.raw(["checkout", "HEAD", "--", ...paths]);
  }

  async isDetached(): Promise<boolean> {
    const ref = await this.git.revparse(["--abbrev-ref", "HEAD"]);
    return ref.trim() === "HEAD";
  }

  /**
   * Name of the branch the remote's HEAD points at, or the first local
   * `main`/`master` branch when the remote does not advertise one.
   */
  async defaultBranch(remote = "origin"): Promise<string | null> {
    try {
      const ref = await this.git.raw(["symbolic-ref", "--quiet", `refs/remotes/${remote}/HEAD`]);
      const name = ref.trim().replace(`refs/remotes/${remote}/`, "");
      if (name) return name;
    } catch {
      // origin/HEAD not set; fall back to well-known names
    }
    const branches = await this.git.branchLocal();
    for (const candidate of ["main", "master"]) {
      if (branches.all.includes(candidate)) return candidate;
    }
    return null;
  }

  async checkoutBranch(branch: string): Promise<void> {
    await this.git.checkout(branch);
  }

  /** True when the current branch tracks an upstream. */
  async hasUpstream(): Promise<boolean> {
    try {
      await this.git.revparse(["--abbrev-ref", "--symbolic-full-name", "@{u}"]);
      return true;
    } catch {
      return false;
    }
  }

  async pull(): Promise<void> {
    await this.git.pull();
  }

  /** Most recent tag reachable from HEAD (`git describe --tags --abbrev=0`). */
  async latestTag(): Promise<string> {
    const out = await this.git.raw(["describe", "--tags", "--abbrev=0"]);
    return out.trim();
  }

  /** Tag pointing at HEAD, or null when HEAD is untagged. */
  async tagAtHead(): Promise<string | null> {
    try {
      const out = await this.git.raw(["describe", "--tags", "--exact-match", "HEAD"]);
      return out.trim() || null;
    } catch {
      return null;
    }
  }

  /** Tag at HEAD if there is one, else the abbreviated commit hash. */
  async revisionAtHead(): Promise<string> {
    const tag = await this.tagAtHead();
    if (tag) return tag;
    const out = await this.git.revparse(["--short", "HEAD"]);
    return out.trim();
  }

  /** Check out a revision without the detached-HEAD advice. */
  async checkoutDetached(revision: string): Promise<void> {
    await this.git.raw(["-c", "advice.detachedHead=false", "checkout", "--quiet", revision]);
  }

  /** Committer name, short author date and full message of HEAD. */
  async headCommitInfo(): Promise<CommitInfo> {
    const out = await this.git.raw(["show", "-s", `--format=%cN${SEP}%as${SEP}%B`]);
    const [author = "", date = "", ...rest] = out.split("\x1f");
    return {
      author: author.trim(),
      date: date.trim(),
      message: rest.join("\x1f").replace(/\s+$/, ""),
    };
  }
}
