import fs from "node:fs";
import path from "node:path";
import { checkProgram, expandSources, parseCommandScript, parseDirectives, withImplicitParsers } from "../batch/directives.js";
import { loadSettings } from "../config/settings.js";
import { errorMessage, isDeployError } from "../core/errors.js";
import type { Diagnostic } from "../log/reporter.js";
import type { RedeployConfig } from "../types/config.js";
import { defaultSettingsPath, loadValidConfig, type InputOptions } from "./setup.js";

export type ValidateResult = { ok: true; diagnostics: Diagnostic[] } | { ok: false; errors: Diagnostic[]; diagnostics: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** Cross-references the schema cannot express. */
export function checkReferences(config: RedeployConfig): Diagnostic[] {
  const out: Diagnostic[] = [];
  const names = new Set<string>();
  for (const repo of config.repositories) {
    if (names.has(repo.name)) out.push(diag("error", "REPO_DUPLICATE", `repository ${repo.name} is listed twice`));
    names.add(repo.name);
    if (!repo.required && !repo.remote) {
      out.push(diag("warn", "REPO_NO_REMOTE", `repository ${repo.name} has no remote and cannot be cloned`));
    }
  }

  if (!config.repositories.some((r) => r.role === "webapp")) {
    out.push(diag("error", "NO_WEBAPP", "no repository has role webapp"));
  }

  const refs: Array<[string, string]> = [
    ["assets.repository", config.assets.repository],
    ["provenance.repository", config.provenance.repository],
    ...Object.entries(config.stamp.tokens).map(([token, repo]): [string, string] => [`stamp.tokens.${token}`, repo]),
  ];
  for (const [where, repo] of refs) {
    if (!names.has(repo)) out.push(diag("error", "REPO_UNKNOWN", `${where} refers to unknown repository "${repo}"`));
  }

  return out;
}

/** Directive programs: inline ones from the config, and existing .bxs files. */
export function checkScripts(config: RedeployConfig, rootDir: string): Diagnostic[] {
  const out: Diagnostic[] = [];
  const buildDir = path.resolve(rootDir, config.build_dir);

  for (const script of config.batch.scripts) {
    const file = path.resolve(rootDir, script.file);
    try {
      if (script.directives) {
        const program = withImplicitParsers(expandSources(parseDirectives(script.directives), buildDir));
        out.push(...checkProgram(program).map((d) => ({ ...d, message: `${script.name}: ${d.message}`, path: file })));
        continue;
      }
      if (!fs.existsSync(file)) {
        out.push(diag("error", "BATCH_SCRIPT_MISSING", `${script.name}: script not found`, { path: file }));
        continue;
      }
      if (path.extname(file) !== ".bxs") continue;

      const parsed = parseCommandScript(fs.readFileSync(file, "utf8"));
      out.push(...checkProgram(parsed.directives).map((d) => ({ ...d, message: `${script.name}: ${d.message}`, path: file })));
      if (parsed.unsupported.length > 0) {
        out.push(
          diag("info", "BATCH_UNCHECKED", `${script.name}: not checked: ${[...new Set(parsed.unsupported)].join(", ")}`, {
            path: file,
          }),
        );
      }
    } catch (e) {
      out.push(diag("error", "BATCH_SCRIPT_INVALID", `${script.name}: ${errorMessage(e)}`, { path: file }));
    }
  }
  return out;
}

export function validateAll(opts: InputOptions & { checkSettings?: boolean }): ValidateResult {
  const diagnostics: Diagnostic[] = [];

  let config: RedeployConfig;
  try {
    config = loadValidConfig(opts);
  } catch (e) {
    const d = diag("error", isDeployError(e) ? e.code : "CONFIG_ERROR", errorMessage(e));
    return { ok: false, errors: [d], diagnostics: [d] };
  }

  const rootDir = path.resolve(path.dirname(path.resolve(opts.configDir)), config.root_dir);
  diagnostics.push(...checkReferences(config), ...checkScripts(config, rootDir));

  if (opts.checkSettings !== false) {
    try {
      loadSettings(opts.settingsPath ?? defaultSettingsPath(opts.configDir), opts.env);
    } catch (e) {
      diagnostics.push(diag("error", isDeployError(e) ? e.code : "SETTINGS_INVALID", errorMessage(e)));
    }
  }

  const errors = diagnostics.filter((d) => d.level === "error");
  return errors.length > 0 ? { ok: false, errors, diagnostics } : { ok: true, diagnostics };
}
