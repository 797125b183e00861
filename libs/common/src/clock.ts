import { Injectable } from '@nestjs/common';

/**
 * Source of "now" for the pipeline stages. Replaced in tests to control
 * cache expiry and generated timestamps.
 */
@Injectable()
export class Clock {
  now(): Date {
    return new Date();
  }
}
