import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { RedeployConfig } from "../types/config.js";

export const DEFAULT_SCHEMA_PATH = path.resolve(
  path.dirname(new URL(import.meta.url).pathname),
  "../../schemas/config.schema.json",
);

export type ConfigValidationResult =
  | { valid: true; config: RedeployConfig; errors: null }
  | { valid: false; errors: string };

const compiled = new Map<string, AjvValidateFn<RedeployConfig>>();

function validatorFor(schemaPath: string): AjvValidateFn<RedeployConfig> {
  const cached = compiled.get(schemaPath);
  if (cached) return cached;

  const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, "utf8"));
  const validate = loadAjv().compile<RedeployConfig>(schema);
  compiled.set(schemaPath, validate);
  return validate;
}

/** Validate a loaded config against schemas/config.schema.json. */
export function validateConfig(config: unknown, schemaPath: string = DEFAULT_SCHEMA_PATH): ConfigValidationResult {
  const validate = validatorFor(schemaPath);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: loadAjv().errorsText(validate.errors) };
}
