import { Clock, addSeconds } from '@weatherscape/common';

export class FakeClock extends Clock {
  private current: Date;

  constructor(start = new Date('2026-10-19T12:00:00.000Z')) {
    super();
    this.current = start;
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(seconds: number): void {
    this.current = addSeconds(this.current, seconds);
  }
}
