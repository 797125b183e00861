import { plainToInstance, type ClassConstructor } from 'class-transformer';
import { validateSync, type ValidationError } from 'class-validator';
import { InvalidMessageError } from '@weatherscape/common';

function flattenViolations(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((text) =>
      text.startsWith(error.property) ? `${prefix ? `${prefix}.` : ''}${text}` : `${path}: ${text}`,
    );
    return [...own, ...flattenViolations(error.children ?? [], path)];
  });
}

/**
 * Validates a raw queue body against the queue's message class.
 * Unknown properties are dropped so nothing unvalidated travels downstream.
 */
export function parseMessage<T extends object>(
  queue: string,
  schema: ClassConstructor<T>,
  body: unknown,
): T {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new InvalidMessageError(queue, ['body must be a JSON object']);
  }

  const message = plainToInstance(schema, body);
  const errors = validateSync(message, { whitelist: true, forbidUnknownValues: true });

  if (errors.length > 0) {
    throw new InvalidMessageError(queue, flattenViolations(errors));
  }
  return message;
}
