/**
 * Pipeline error taxonomy
 *
 * - configuration: flag/input combinations that cannot work, raised before any file I/O
 * - io: a file could not be opened, read or written
 * - parse: the ASN table has no usable start/end pairs
 * - empty: filtering left nothing to scan
 * - tool: an external binary could not be started or exited non-zero
 */

export type PipelineErrorKind = 'configuration' | 'io' | 'parse' | 'empty' | 'tool';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly path?: string;

  constructor(kind: PipelineErrorKind, message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.kind = kind;
    this.path = options.path;
  }
}

export function configurationError(message: string): PipelineError {
  return new PipelineError('configuration', message);
}

export function ioError(message: string, path: string, cause?: unknown): PipelineError {
  const detail = cause instanceof Error ? `: ${cause.message}` : '';
  return new PipelineError('io', `${message}${detail}`, { path, cause });
}

export function parseError(message: string, path: string): PipelineError {
  return new PipelineError('parse', message, { path });
}

export function toolError(message: string, cause?: unknown): PipelineError {
  return new PipelineError('tool', message, { cause });
}

/**
 * One-line message for anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
