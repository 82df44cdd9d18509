import fs from "node:fs";
import path from "node:path";
import { expandSources, parseCommandScript, parseDirectives, renderCommandScript, withImplicitParsers } from "../batch/directives.js";
import { simulateProgram, type EngineState } from "../batch/simulator.js";
import { effectiveMode } from "../sync/synchronizer.js";
import type { SyncMode } from "../types/config.js";
import type { DatabaseDirective } from "../types/directive.js";
import { loadValidConfig, type InputOptions } from "./setup.js";

export type ScriptPlan = {
  name: string;
  file: string;
  source: "inline" | "file" | "missing";
  script: string | null;
  directives: DatabaseDirective[];
  state: EngineState | null;
};

export type Plan = {
  onlyTags: boolean;
  buildDir: string;
  repositories: Array<{ name: string; mode: SyncMode; path: string }>;
  scripts: ScriptPlan[];
};

/** What a run would do, without touching any repository or the engine. */
export function plan(opts: InputOptions & { onlyTags?: boolean; buildDir?: string }): Plan {
  const config = loadValidConfig(opts);
  const rootDir = path.resolve(path.dirname(path.resolve(opts.configDir)), config.root_dir);
  const buildDir = path.resolve(rootDir, opts.buildDir ?? config.build_dir);
  const onlyTags = opts.onlyTags ?? config.only_tags;

  const scripts = config.batch.scripts.map((s): ScriptPlan => {
    const file = path.resolve(rootDir, s.file);
    if (s.directives) {
      const directives = withImplicitParsers(expandSources(parseDirectives(s.directives), buildDir));
      return { name: s.name, file, source: "inline", script: renderCommandScript(directives), directives, state: simulateProgram(directives) };
    }
    if (!fs.existsSync(file)) return { name: s.name, file, source: "missing", script: null, directives: [], state: null };

    const text = fs.readFileSync(file, "utf8");
    if (path.extname(file) !== ".bxs") return { name: s.name, file, source: "file", script: text, directives: [], state: null };
    const { directives } = parseCommandScript(text);
    return { name: s.name, file, source: "file", script: text, directives, state: simulateProgram(directives) };
  });

  return {
    onlyTags,
    buildDir,
    repositories: config.repositories.map((r) => ({
      name: r.name,
      mode: effectiveMode(r, onlyTags),
      path: path.resolve(rootDir, r.path.split("${build_dir}").join(buildDir)),
    })),
    scripts,
  };
}
