/**
 * Error taxonomy for a redeploy run.
 *
 * configuration: settings, config, credentials or a mandatory directory.
 * synchronization: git network/merge/checkout failures.
 * io: file copy and document rewrite failures.
 * engine: the database batch process exited non-zero or timed out.
 */
export type DeployErrorKind = "configuration" | "synchronization" | "io" | "engine";

export class DeployError extends Error {
  constructor(
    public readonly kind: DeployErrorKind,
    public readonly code: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "DeployError";
  }
}

export class ConfigurationError extends DeployError {
  constructor(code: string, message: string, cause?: unknown) {
    super("configuration", code, message, cause);
    this.name = "ConfigurationError";
  }
}

export class SynchronizationError extends DeployError {
  constructor(code: string, message: string, cause?: unknown) {
    super("synchronization", code, message, cause);
    this.name = "SynchronizationError";
  }
}

export class AssetIoError extends DeployError {
  constructor(code: string, message: string, cause?: unknown) {
    super("io", code, message, cause);
    this.name = "AssetIoError";
  }
}

export class EngineError extends DeployError {
  constructor(
    code: string,
    message: string,
    public readonly exitCode: number | null,
    cause?: unknown,
  ) {
    super("engine", code, message, cause);
    this.name = "EngineError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isDeployError(err: unknown): err is DeployError {
  return err instanceof DeployError;
}
