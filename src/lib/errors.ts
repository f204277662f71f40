/**
 * Error types raised by the paradigm runner
 */

export class InvalidConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfig';
    this.issues = issues;
  }
}

export class PersistenceError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to save log file ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PersistenceFailure';
    this.path = path;
  }
}

export class RunInProgressError extends Error {
  constructor(active: string) {
    super(`Cannot start a run while "${active}" is still active`);
    this.name = 'RunInProgress';
  }
}
