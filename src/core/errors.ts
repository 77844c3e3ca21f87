export type ErrorCode =
  | 'NoRuntimeFound'
  | 'ProbeFailed'
  | 'RequiredToolMissing'
  | 'CacheInvalidationFailed'
  | 'InvalidOverride';

export class PatchlinkError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProbeError extends PatchlinkError {
  constructor(
    code: 'NoRuntimeFound' | 'ProbeFailed',
    readonly installationPath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
  }
}

export class RequiredToolMissingError extends PatchlinkError {
  constructor(readonly command: string) {
    super('RequiredToolMissing', `required command not found: ${command}`);
  }
}

export class CacheInvalidationError extends PatchlinkError {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    options?: { cause?: unknown },
  ) {
    super('CacheInvalidationFailed', `${command} exited with status ${exitCode}`, options);
  }
}

export class InvalidOverrideError extends PatchlinkError {
  constructor(message: string) {
    super('InvalidOverride', message);
  }
}
