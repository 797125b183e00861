import { Logger } from '@nestjs/common';
import { traceLogFields, type TraceContext } from './trace-context';

export type TraceLogExtra = Record<string, string | number | boolean | null | string[]>;

/**
 * Wraps a Nest logger so every entry carries the message's trace context as
 * structured fields.
 */
export class TraceLogger {
  constructor(private readonly logger: Logger) {}

  log(message: string, trace: TraceContext, extra: TraceLogExtra = {}): void {
    this.logger.log({ message, ...traceLogFields(trace), ...extra });
  }

  warn(message: string, trace: TraceContext, extra: TraceLogExtra = {}): void {
    this.logger.warn({ message, ...traceLogFields(trace), ...extra });
  }

  error(message: string, trace: TraceContext, error: unknown, extra: TraceLogExtra = {}): void {
    this.logger.error(
      { message, ...traceLogFields(trace), ...extra },
      error instanceof Error ? error.stack : undefined,
    );
  }
}
