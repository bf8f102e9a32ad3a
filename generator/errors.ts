/**
 * Error taxonomy for a generation run.
 *
 * Every failure that can stop a stage is a `GeneratorError` tagged with the
 * stage it came from, so the CLI can report which part of the run failed.
 */

export type PipelineStage = 'config' | 'collection' | 'details' | 'export';

export class GeneratorError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GeneratorError';
    this.stage = stage;
  }
}

export type TransportErrorKind =
  | 'timeout'
  | 'connection-failed'
  | 'malformed-response'
  | 'rate-limit-exceeded'
  | 'rejected';

export class TransportError extends GeneratorError {
  readonly kind: TransportErrorKind;
  readonly attempts: number;
  readonly status?: number;

  constructor(
    stage: PipelineStage,
    kind: TransportErrorKind,
    message: string,
    details: { attempts: number; status?: number; cause?: unknown },
  ) {
    super(stage, message, { cause: details.cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.attempts = details.attempts;
    this.status = details.status;
  }
}

export class CollectionUnavailableError extends GeneratorError {
  readonly username: string;

  constructor(username: string, reason: string, options?: { cause?: unknown }) {
    super('collection', `Collection for "${username}" is unavailable: ${reason}`, options);
    this.name = 'CollectionUnavailableError';
    this.username = username;
  }
}

export class ExportError extends GeneratorError {
  readonly outDir: string;

  constructor(outDir: string, message: string, options?: { cause?: unknown }) {
    super('export', message, options);
    this.name = 'ExportError';
    this.outDir = outDir;
  }
}

export class ConfigError extends GeneratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

/** Message of any thrown value, for log lines and skip reasons. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
