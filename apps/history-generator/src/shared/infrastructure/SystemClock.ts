import { Clock } from '@shared/ports/Clock';

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}
