import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { materializeScript, resolveCommand, rewriteScriptPaths, runBatchScripts, type BatchContext } from "../src/batch/runner.js";
import { ConfigurationError, EngineError } from "../src/core/errors.js";
import type { ProcessResult, ProcessRunner } from "../src/core/process.js";
import { silentReporter } from "../src/log/reporter.js";
import type { BatchConfig } from "../src/types/config.js";
import { tmpDir } from "./helpers.js";

type Call = { command: string; args: string[]; cwd: string; env: NodeJS.ProcessEnv; timeoutMs: number };

function fakeRunner(results: Partial<ProcessResult>[] = []): { runner: ProcessRunner; calls: Call[] } {
  const calls: Call[] = [];
  const runner: ProcessRunner = async (command, args, opts) => {
    calls.push({ command, args, ...opts });
    return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...results[calls.length - 1] };
  };
  return { runner, calls };
}

describe("rewriteScriptPaths", () => {
  let dir: string;

  beforeEach(() => {
    dir = tmpDir("rewrite");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("replaces every occurrence and is stable on a second run", () => {
    const file = path.join(dir, "deploy.bxs");
    fs.writeFileSync(file, "CREATE DB a webapp/vicav-app/data\nADD webapp/vicav-app/more\n", "utf8");

    expect(rewriteScriptPaths(file, "webapp/vicav-app/", "/srv/vicav/")).toBe(2);
    expect(fs.readFileSync(file, "utf8")).toBe("CREATE DB a /srv/vicav/data\nADD /srv/vicav/more\n");
    expect(rewriteScriptPaths(file, "webapp/vicav-app/", "/srv/vicav/")).toBe(0);
  });

  it("does not rewrite a replacement that contains the original path", () => {
    const file = path.join(dir, "deploy.bxs");
    fs.writeFileSync(file, "CREATE DB a webapp/vicav-app/data\n", "utf8");
    const to = "/opt/basex/webapp/vicav-app/";

    expect(rewriteScriptPaths(file, "webapp/vicav-app/", to)).toBe(1);
    expect(rewriteScriptPaths(file, "webapp/vicav-app/", to)).toBe(0);
    expect(fs.readFileSync(file, "utf8")).toBe("CREATE DB a /opt/basex/webapp/vicav-app/data\n");
  });

  it("leaves the file alone when from equals to", () => {
    const file = path.join(dir, "deploy.bxs");
    fs.writeFileSync(file, "webapp/vicav-app/\n", "utf8");
    expect(rewriteScriptPaths(file, "webapp/vicav-app/", "webapp/vicav-app/")).toBe(0);
  });
});

describe("resolveCommand", () => {
  it("resolves paths against the root and keeps bare names", () => {
    expect(resolveCommand("./execute-basex-batch.sh", "/opt/basex")).toBe("/opt/basex/execute-basex-batch.sh");
    expect(resolveCommand("basex", "/opt/basex")).toBe("basex");
  });
});

describe("runBatchScripts", () => {
  let root: string;
  let ctx: BatchContext;

  beforeEach(() => {
    root = tmpDir("batch");
    ctx = {
      rootDir: root,
      buildDir: path.join(root, "webapp", "vicav-app"),
      credentials: { username: "admin", password: "test-secret" },
      reporter: silentReporter(),
      env: { PATH: "/usr/bin" },
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function batch(scripts: BatchConfig["scripts"]): BatchConfig {
    return { command: "./execute-basex-batch.sh", timeout_s: 5, scripts };
  }

  it("runs scripts in order with credentials and the target", async () => {
    fs.writeFileSync(path.join(root, "deploy.bxs"), "<commands/>\n", "utf8");
    fs.writeFileSync(path.join(root, "refresh.xqtl"), "()\n", "utf8");
    const { runner, calls } = fakeRunner();

    const runs = await runBatchScripts(
      batch([
        { name: "deploy", file: "deploy.bxs", invoke: "deploy" },
        { name: "refresh", file: "refresh.xqtl", quiet: true },
      ]),
      { ...ctx, runner, target: "staging" },
    );

    expect(runs.map((r) => r.name)).toEqual(["deploy", "refresh"]);
    expect(calls.map((c) => c.args)).toEqual([
      ["deploy", "staging"],
      ["refresh.xqtl", "staging"],
    ]);
    expect(calls[0].command).toBe(path.join(root, "execute-basex-batch.sh"));
    expect(calls[0].cwd).toBe(root);
    expect(calls[0].timeoutMs).toBe(5000);
    expect(calls[0].env).toEqual({ PATH: "/usr/bin", USERNAME: "admin", PASSWORD: "test-secret" });
  });

  it("rewrites the script with the build directory before running it", async () => {
    const file = path.join(root, "deploy.bxs");
    fs.writeFileSync(file, "CREATE DB a webapp/vicav-app/data\n", "utf8");
    const { runner } = fakeRunner();

    const [run] = await runBatchScripts(
      batch([{ name: "deploy", file: "deploy.bxs", rewrite: { from: "webapp/vicav-app/", to: "${build_dir}/" } }]),
      { ...ctx, runner },
    );

    expect(run.rewritten).toBe(1);
    expect(fs.readFileSync(file, "utf8")).toBe(`CREATE DB a ${ctx.buildDir}/data\n`);
  });

  it("reports engine output unless the script is quiet", async () => {
    fs.writeFileSync(path.join(root, "a.bxs"), "", "utf8");
    fs.writeFileSync(path.join(root, "b.bxs"), "", "utf8");
    const { runner } = fakeRunner([{ stdout: "Database 'a' created.\n\n" }, { stdout: "hidden\n" }]);

    await runBatchScripts(
      batch([
        { name: "a", file: "a.bxs" },
        { name: "b", file: "b.bxs", quiet: true },
      ]),
      { ...ctx, runner },
    );

    const output = ctx.reporter.diagnostics().filter((d) => d.code === "ENGINE_OUTPUT");
    expect(output.map((d) => [d.stage, d.message])).toEqual([["batch:a", "Database 'a' created."]]);
  });

  it("writes directive programs to the script file", async () => {
    const { runner } = fakeRunner();
    await runBatchScripts(
      batch([
        {
          name: "deploy",
          file: "generated/deploy.bxs",
          directives: [{ "create-db": { name: "vicav_texts", source: "${build_dir}/texts" } }, { close: true }],
        },
      ]),
      { ...ctx, runner },
    );

    expect(fs.readFileSync(path.join(root, "generated", "deploy.bxs"), "utf8")).toBe(
      `<commands>\n  <create-db name="vicav_texts">${ctx.buildDir}/texts</create-db>\n  <close/>\n</commands>\n`,
    );
  });

  it("stops at the first failing script", async () => {
    fs.writeFileSync(path.join(root, "a.bxs"), "", "utf8");
    fs.writeFileSync(path.join(root, "b.bxs"), "", "utf8");
    const { runner, calls } = fakeRunner([{ exitCode: 1, stderr: "Stopped at line 3\nDatabase locked\n" }]);

    const err = await runBatchScripts(
      batch([
        { name: "a", file: "a.bxs" },
        { name: "b", file: "b.bxs" },
      ]),
      { ...ctx, runner },
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EngineError);
    expect(err).toMatchObject({ code: "ENGINE_FAILED", exitCode: 1, message: "a: exited with code 1: Stopped at line 3 | Database locked" });
    expect(calls).toHaveLength(1);
  });

  it("reports timeouts and spawn failures separately", async () => {
    fs.writeFileSync(path.join(root, "a.bxs"), "", "utf8");
    const timedOut = fakeRunner([{ exitCode: null, timedOut: true }]);
    await expect(runBatchScripts(batch([{ name: "a", file: "a.bxs" }]), { ...ctx, runner: timedOut.runner })).rejects.toMatchObject({
      code: "ENGINE_TIMEOUT",
      message: "a: timed out after 5s",
    });

    const missing = fakeRunner([{ exitCode: null, spawnError: "spawn ENOENT" }]);
    await expect(runBatchScripts(batch([{ name: "a", file: "a.bxs" }]), { ...ctx, runner: missing.runner })).rejects.toMatchObject({
      code: "ENGINE_SPAWN_FAILED",
    });
  });

  it("hands the stage signal to the engine and starts nothing once it aborts", async () => {
    fs.writeFileSync(path.join(root, "a.bxs"), "", "utf8");
    fs.writeFileSync(path.join(root, "b.bxs"), "", "utf8");
    const controller = new AbortController();
    const signals: Array<AbortSignal | undefined> = [];
    const runner: ProcessRunner = async (_command, _args, opts) => {
      signals.push(opts.signal);
      controller.abort();
      return { exitCode: 0, stdout: "", stderr: "", timedOut: false };
    };

    const err = await runBatchScripts(
      batch([
        { name: "a", file: "a.bxs" },
        { name: "b", file: "b.bxs" },
      ]),
      { ...ctx, runner, signal: controller.signal },
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EngineError);
    expect(err).toMatchObject({ code: "ENGINE_CANCELLED", message: "b: not started, the batch stage was cancelled" });
    expect(signals).toHaveLength(1);
    expect(signals[0]).toBe(controller.signal);
  });

  it("fails with a configuration error when a script file is missing", async () => {
    const { runner, calls } = fakeRunner();
    const err = await runBatchScripts(batch([{ name: "a", file: "missing.bxs" }]), { ...ctx, runner }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ code: "BATCH_SCRIPT_MISSING" });
    expect(calls).toHaveLength(0);
  });
});

describe("materializeScript", () => {
  it("returns null for scripts kept by hand", () => {
    expect(materializeScript({ name: "a", file: "a.bxs" }, "/nowhere", "/nowhere/build")).toBeNull();
  });
});
