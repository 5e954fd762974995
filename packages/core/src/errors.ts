/** Base class for every error the pipeline raises on purpose. */
export class RevloopError extends Error {
  constructor(
    message: string,
    readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A path resolved outside the sandbox root, or onto another filesystem root. */
export class SandboxViolation extends RevloopError {
  constructor(
    readonly requestedPath: string,
    readonly sandboxRoot: string,
    reason: 'outside' | 'different-root' = 'outside',
  ) {
    super(
      reason === 'different-root'
        ? `Security Error: Path '${requestedPath}' is on a different drive than sandbox '${sandboxRoot}'`
        : `Security Error: Access to '${requestedPath}' is denied (outside sandbox '${sandboxRoot}')`,
      'SANDBOX_VIOLATION',
    );
  }
}

/** Invalid or unusable configuration value. */
export class ConfigError extends RevloopError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
