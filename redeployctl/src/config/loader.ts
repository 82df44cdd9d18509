import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigurationError } from "../core/errors.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

const ENV_PREFIX = "REDEPLOY_";

type Layer = Record<string, unknown>;

function isPlainObject(value: unknown): value is Layer {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two layers. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isPlainObject(val) && isPlainObject(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty one if not found. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigurationError("CONFIG_PARSE_FAILED", `Cannot parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`, e);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError("CONFIG_PARSE_FAILED", `Expected a mapping at the top of ${filePath}`);
  }
  return parsed;
}

/** Coerce an env string to the type of the value it replaces. */
function coerce(raw: string, previous: unknown): unknown {
  if (typeof previous === "boolean") return raw === "true" || raw === "1";
  if (typeof previous === "number") {
    const n = Number(raw);
    return Number.isFinite(n) ? n : raw;
  }
  return raw;
}

/** Apply REDEPLOY_ prefixed environment variable overrides to top-level scalar keys. */
function applyEnvOverrides(config: Layer, env: NodeJS.ProcessEnv): Layer {
  const result: Layer = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // REDEPLOY_BUILD_DIR → build_dir
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (isPlainObject(result[configKey]) || Array.isArray(result[configKey])) continue;
    result[configKey] = coerce(value, result[configKey]);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← REDEPLOY_* variables.
 * The result is unvalidated; pass it through validateConfig.
 */
export function loadConfig(opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {}): Layer {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;

  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ConfigurationError("CONFIG_DIR_MISSING", `Config directory not found: ${dir}`);
  }

  const basePath = path.join(dir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    throw new ConfigurationError("CONFIG_MISSING", `Missing base config: ${basePath}`);
  }

  let merged = loadYaml(basePath);
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }

  return applyEnvOverrides(merged, opts.env ?? process.env);
}
