import { InvalidZipError } from './errors';

const ZIP_PATTERN = /^\d{5}$/;

export function isValidZip(value: unknown): value is string {
  return typeof value === 'string' && ZIP_PATTERN.test(value);
}

export function assertValidZip(value: string): string {
  const zip = value.trim();
  if (!isValidZip(zip)) {
    throw new InvalidZipError(value);
  }
  return zip;
}
