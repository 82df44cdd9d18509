import fs from "node:fs";
import path from "node:path";
import { renderCommandScript, expandSources, parseDirectives, withImplicitParsers } from "./directives.js";
import { ConfigurationError, EngineError } from "../core/errors.js";
import { execFileRunner, type ProcessRunner } from "../core/process.js";
import { engineEnv, type Credentials } from "../config/settings.js";
import type { Reporter } from "../log/reporter.js";
import type { BatchConfig, BatchScriptConfig } from "../types/config.js";

export type BatchContext = {
  rootDir: string;
  /** Absolute build directory; substituted for `${build_dir}`. */
  buildDir: string;
  credentials: Credentials;
  /** Forwarded as the last argument of every invocation when set. */
  target?: string;
  reporter: Reporter;
  runner?: ProcessRunner;
  env?: NodeJS.ProcessEnv;
  /** Kills the running script and stops before the next one. */
  signal?: AbortSignal;
};

export type ScriptRun = {
  name: string;
  file: string;
  rewritten: number;
  exitCode: number;
  duration_ms: number;
};

/**
 * Literal, in-place replacement of `from` by `to` in a script file.
 * Occurrences already inside `to` are left alone, so repeated runs are stable.
 * Returns the number of replacements.
 */
export function rewriteScriptPaths(file: string, from: string, to: string): number {
  if (!from || from === to) return 0;
  const before = fs.readFileSync(file, "utf8");

  let count = 0;
  const segments = to.includes(from) ? before.split(to) : [before];
  const rewritten = segments.map((segment) => {
    const parts = segment.split(from);
    count += parts.length - 1;
    return parts.join(to);
  });

  if (count > 0) fs.writeFileSync(file, rewritten.join(to), "utf8");
  return count;
}

function expand(template: string, buildDir: string): string {
  return template.split("${build_dir}").join(buildDir);
}

/** Path of the batch command; bare names are looked up on PATH. */
export function resolveCommand(command: string, rootDir: string): string {
  return command.includes("/") ? path.resolve(rootDir, command) : command;
}

/** Write the script's directives (if any) to its file; returns the rendered text. */
export function materializeScript(script: BatchScriptConfig, rootDir: string, buildDir: string): string | null {
  if (!script.directives) return null;
  const directives = withImplicitParsers(expandSources(parseDirectives(script.directives), buildDir));
  const text = renderCommandScript(directives);
  const file = path.resolve(rootDir, script.file);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text, "utf8");
  return text;
}

/**
 * Run the batch scripts in order. The first failing invocation throws an
 * EngineError and the remaining scripts are not run.
 */
export async function runBatchScripts(batch: BatchConfig, ctx: BatchContext): Promise<ScriptRun[]> {
  const runner = ctx.runner ?? execFileRunner;
  const command = resolveCommand(batch.command, ctx.rootDir);
  const env = engineEnv(ctx.credentials, ctx.env);
  const runs: ScriptRun[] = [];

  for (const script of batch.scripts) {
    const stage = `batch:${script.name}`;
    const file = path.resolve(ctx.rootDir, script.file);
    if (ctx.signal?.aborted) {
      throw new EngineError("ENGINE_CANCELLED", `${script.name}: not started, the batch stage was cancelled`, null);
    }

    materializeScript(script, ctx.rootDir, ctx.buildDir);
    if (!fs.existsSync(file)) {
      throw new ConfigurationError("BATCH_SCRIPT_MISSING", `${script.name}: script not found: ${file}`);
    }

    const rewritten = script.rewrite
      ? rewriteScriptPaths(file, script.rewrite.from, expand(script.rewrite.to, ctx.buildDir))
      : 0;

    const args = [script.invoke ?? script.file];
    if (ctx.target !== undefined && ctx.target !== "") args.push(ctx.target);

    ctx.reporter.info("BATCH_START", `running ${script.name}`, { stage, details: { args } });
    const started = Date.now();
    const res = await runner(command, args, {
      cwd: ctx.rootDir,
      env,
      timeoutMs: batch.timeout_s * 1000,
      signal: ctx.signal,
    });
    const duration_ms = Date.now() - started;

    if (!script.quiet) {
      for (const line of res.stdout.split("\n")) {
        if (line.trim()) ctx.reporter.info("ENGINE_OUTPUT", line, { stage });
      }
    }

    if (res.spawnError) {
      throw new EngineError("ENGINE_SPAWN_FAILED", `${script.name}: cannot start ${command}: ${res.spawnError}`, null);
    }
    if (res.timedOut) {
      throw new EngineError("ENGINE_TIMEOUT", `${script.name}: timed out after ${batch.timeout_s}s`, res.exitCode);
    }
    if (res.exitCode !== 0) {
      const detail = res.stderr.trim().split("\n").slice(-5).join(" | ");
      throw new EngineError(
        "ENGINE_FAILED",
        `${script.name}: exited with code ${res.exitCode ?? "unknown"}${detail ? `: ${detail}` : ""}`,
        res.exitCode,
      );
    }

    runs.push({ name: script.name, file, rewritten, exitCode: 0, duration_ms });
  }

  return runs;
}
