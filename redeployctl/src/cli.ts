#!/usr/bin/env node

import path from "node:path";
import { Command, Option } from "commander";
import { redeploy } from "./commands/redeploy.js";
import { validateAll } from "./commands/validate.js";
import { plan } from "./commands/plan.js";
import { listRuns, status } from "./commands/status.js";
import { EXIT } from "./commands/exit-codes.js";
import { loadValidConfig } from "./commands/setup.js";
import { STAGE_IDS, type StageId } from "./core/stages.js";
import { Reporter, type OutputFormat } from "./log/reporter.js";
import { errorMessage } from "./core/errors.js";

type CommonOpts = { config: string; env?: string; settings?: string; format: string };

function isStageId(value: string): value is StageId {
  return STAGE_IDS.some((id) => id === value);
}

function toFormat(value: string): OutputFormat {
  return value === "jsonl" ? "jsonl" : "human";
}

function withCommon(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory", "config")
    .option("--env <name>", "Config override layer (config/<name>.yaml)")
    .option("--settings <file>", "Settings file (default: redeploy.settings beside the config directory)")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));
}

const program = new Command();

program
  .name("redeployctl")
  .description("Redeploy the VICAV web application, its data and the BaseX databases")
  .version("1.0.0");

withCommon(
  program
    .command("run")
    .description("Synchronize repositories, copy assets, stamp versions and run the batch scripts")
    .argument("[target]", "Forwarded to every batch invocation"),
)
  .option("--only-tags", "Deploy the latest tag of every repository")
  .option("--no-only-tags", "Deploy the latest commit of every repository")
  .option("--build-dir <path>", "Web application checkout (overrides BUILD_DIR)")
  .option("--runs-dir <path>", "Where run records are written")
  .addOption(new Option("--skip <stages...>", "Stages to leave out").choices([...STAGE_IDS]))
  .action(
    async (
      target: string | undefined,
      opts: CommonOpts & { onlyTags?: boolean; buildDir?: string; runsDir?: string; skip?: string[] },
    ) => {
      const reporter = new Reporter(toFormat(opts.format));
      const res = await redeploy({
        configDir: opts.config,
        envName: opts.env,
        settingsPath: opts.settings,
        runsDir: opts.runsDir,
        skip: (opts.skip ?? []).filter(isStageId),
        overrides: { target, onlyTags: opts.onlyTags, buildDir: opts.buildDir },
        reporter,
      });
      if (!res.ok && reporter.format === "human") console.error(res.error.message);
      process.exitCode = res.exitCode;
    },
  );

withCommon(program.command("validate").description("Validate settings, config and batch scripts"))
  .option("--no-check-settings", "Do not require the settings file")
  .action((opts: CommonOpts & { checkSettings: boolean }) => {
    const reporter = new Reporter(toFormat(opts.format));
    const res = validateAll({
      configDir: opts.config,
      envName: opts.env,
      settingsPath: opts.settings,
      checkSettings: opts.checkSettings,
    });
    for (const d of res.diagnostics) reporter.emit(d);
    if (!res.ok) {
      process.exitCode = EXIT.CONFIG_ERROR;
      return;
    }
    reporter.info("OK", "OK");
  });

withCommon(program.command("plan").description("Show the batch scripts and the database state they produce"))
  .option("--only-tags", "Plan a tag-only deployment")
  .option("--no-only-tags", "Plan a latest-commit deployment")
  .option("--build-dir <path>", "Web application checkout")
  .action((opts: CommonOpts & { onlyTags?: boolean; buildDir?: string }) => {
    const p = plan({ configDir: opts.config, envName: opts.env, onlyTags: opts.onlyTags, buildDir: opts.buildDir });
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(p) + "\n");
      return;
    }
    console.log(`mode: ${p.onlyTags ? "tags only" : "latest commits"}`);
    console.log(`build dir: ${p.buildDir}`);
    for (const r of p.repositories) console.log(`  ${r.name}  ${r.mode}  ${r.path}`);
    for (const s of p.scripts) {
      console.log(`\n# ${s.name} (${s.source}) ${s.file}`);
      if (s.script) console.log(s.script.trimEnd());
      if (s.state) {
        for (const db of Object.values(s.state.databases)) {
          const options = Object.entries(db.options).map(([k, v]) => `${k}=${v}`).join(" ");
          console.log(`  => ${db.name}${db.source ? ` <- ${db.source}` : ""}${options ? `  [${options}]` : ""}`);
        }
      }
    }
  });

withCommon(program.command("status").description("Show a run record, or list runs").argument("[id]", "Run id"))
  .option("--runs-dir <path>", "Where run records are written")
  .action((id: string | undefined, opts: CommonOpts & { runsDir?: string }) => {
    const runsDir = opts.runsDir
      ? path.resolve(opts.runsDir)
      : (() => {
          const config = loadValidConfig({ configDir: opts.config, envName: opts.env });
          return path.resolve(path.dirname(path.resolve(opts.config)), config.root_dir, config.runs_dir);
        })();

    if (id) {
      const res = status({ runsDir, runId: id });
      if (!res.ok) {
        console.error(res.error);
        process.exitCode = 1;
        return;
      }
      console.log(opts.format === "jsonl" ? JSON.stringify(res.record) : JSON.stringify(res.record, null, 2));
      return;
    }

    const list = listRuns(runsDir);
    if (opts.format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
      return;
    }
    if (list.length === 0) {
      console.log("No runs found.");
      return;
    }
    for (const item of list) console.log(`${item.id}  ${item.status}  ${item.updated_at}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(JSON.stringify({ ok: false, error: errorMessage(err) }) + "\n");
  process.exit(EXIT.CONFIG_ERROR);
});
