import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { loadSettings, DEFAULT_SETTINGS_FILE, type Settings } from "../config/settings.js";
import { validateConfig } from "../config/validator.js";
import { ConfigurationError } from "../core/errors.js";
import type { RedeployConfig } from "../types/config.js";

export type InputOptions = {
  configDir: string;
  envName?: string;
  /** Defaults to redeploy.settings beside the config directory. */
  settingsPath?: string;
  env?: NodeJS.ProcessEnv;
};

export function defaultSettingsPath(configDir: string): string {
  return path.join(path.dirname(path.resolve(configDir)), DEFAULT_SETTINGS_FILE);
}

/** Load and validate the config; throws ConfigurationError. */
export function loadValidConfig(opts: InputOptions): RedeployConfig {
  const raw = loadConfig({ configDir: path.resolve(opts.configDir), envName: opts.envName, env: opts.env });
  const res = validateConfig(raw);
  if (!res.valid) {
    throw new ConfigurationError("CONFIG_INVALID", `Invalid configuration: ${res.errors}`);
  }
  return res.config;
}

export function loadInputs(opts: InputOptions): { config: RedeployConfig; settings: Settings } {
  const config = loadValidConfig(opts);
  const settings = loadSettings(opts.settingsPath ?? defaultSettingsPath(opts.configDir), opts.env);
  return { config, settings };
}
