export type PipelineErrorKind =
  | 'invalid_message'
  | 'configuration'
  | 'transient_upstream'
  | 'stale_pipeline'
  | 'fan_out'
  | 'render'
  | 'invalid_zip'
  | 'unknown_format';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Body of a queue message does not match the queue's schema. Retrying the
 * same body can never succeed.
 */
export class InvalidMessageError extends PipelineError {
  readonly kind = 'invalid_message';

  constructor(
    readonly queue: string,
    readonly violations: string[],
  ) {
    super(`Invalid ${queue} message: ${violations.join('; ')}`);
  }
}

export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration';
}

export class WeatherProviderError extends PipelineError {
  readonly kind = 'transient_upstream';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class StalePipelineError extends PipelineError {
  readonly kind = 'stale_pipeline';

  constructor(readonly zip: string) {
    super(`Stale pipeline: no cached weather data for ${zip}`);
  }
}

export class FanOutError extends PipelineError {
  readonly kind = 'fan_out';

  constructor(
    readonly zip: string,
    readonly enqueued: number,
    readonly total: number,
    options?: { cause?: unknown },
  ) {
    super(`Fan-out for ${zip} stopped after ${enqueued}/${total} jobs`, options);
  }
}

export class RenderError extends PipelineError {
  readonly kind = 'render';
}

export class InvalidZipError extends PipelineError {
  readonly kind = 'invalid_zip';

  constructor(readonly value: string) {
    super(`Invalid ZIP code "${value}": must be 5 digits`);
  }
}

export class UnknownFormatError extends PipelineError {
  readonly kind = 'unknown_format';

  constructor(readonly format: string) {
    super(`Unknown format: ${format}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function errorKind(error: unknown): PipelineErrorKind | 'unexpected' {
  return error instanceof PipelineError ? error.kind : 'unexpected';
}
