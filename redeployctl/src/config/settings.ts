import fs from "node:fs";
import { parse } from "dotenv";
import { ConfigurationError } from "../core/errors.js";

export const DEFAULT_SETTINGS_FILE = "redeploy.settings";

export type Credentials = {
  username: string;
  password: string;
};

export type Settings = {
  credentials: Credentials;
  /** `onlytags`; undefined when the file leaves it unset. */
  onlyTags?: boolean;
  /** `BUILD_DIR`; undefined when unset. */
  buildDir?: string;
};

const KEYS = ["local_username", "local_password", "onlytags", "BUILD_DIR"] as const;

/**
 * Read the shell-style settings file. A value in the file overrides the
 * variable of the same name in `env`, as sourcing the file would; `env`
 * supplies only the keys the file leaves out.
 */
export function loadSettings(settingsPath: string, env: NodeJS.ProcessEnv = process.env): Settings {
  if (!fs.existsSync(settingsPath)) {
    throw new ConfigurationError(
      "SETTINGS_MISSING",
      `Missing settings file ${settingsPath}. Please copy redeploy.settings.dist to redeploy.settings and fill in the credentials.`,
    );
  }

  const fromFile = parse(fs.readFileSync(settingsPath, "utf8"));
  const values: Partial<Record<(typeof KEYS)[number], string>> = {};
  for (const key of KEYS) {
    const value = fromFile[key] ?? env[key];
    if (value !== undefined) values[key] = value;
  }

  const username = values.local_username ?? "";
  const password = values.local_password ?? "";
  if (username === "" || password === "") {
    throw new ConfigurationError("CREDENTIALS_MISSING", "Missing credentials for local BaseX");
  }

  const settings: Settings = { credentials: { username, password } };
  if (values.onlytags !== undefined && values.onlytags !== "") {
    settings.onlyTags = values.onlytags === "true";
  }
  if (values.BUILD_DIR) settings.buildDir = values.BUILD_DIR;
  return settings;
}

/** Environment handed to batch child processes. */
export function engineEnv(credentials: Credentials, base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  return { ...base, USERNAME: credentials.username, PASSWORD: credentials.password };
}
