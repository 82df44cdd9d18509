import { execFile } from "node:child_process";

export type ProcessResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the process could not be started at all (ENOENT, EACCES, …). */
  spawnError?: string;
};

export type ProcessRunner = (
  command: string,
  args: string[],
  opts: { cwd: string; env: NodeJS.ProcessEnv; timeoutMs: number; signal?: AbortSignal },
) => Promise<ProcessResult>;

const MAX_BUFFER = 50 * 1024 * 1024;

/** Runs a command without a shell; never rejects. */
export const execFileRunner: ProcessRunner = (command, args, opts) =>
  new Promise((resolve) => {
    execFile(
      command,
      args,
      { cwd: opts.cwd, env: opts.env, timeout: opts.timeoutMs, maxBuffer: MAX_BUFFER, signal: opts.signal },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        const timedOut = error.killed === true && error.signal === "SIGTERM";
        if (typeof error.code === "string") {
          resolve({ exitCode: null, stdout, stderr, timedOut, spawnError: error.message });
          return;
        }
        resolve({ exitCode: typeof error.code === "number" ? error.code : null, stdout, stderr, timedOut });
      },
    );
  });
