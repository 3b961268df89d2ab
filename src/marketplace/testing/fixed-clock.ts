import { Clock } from '../marketplace.types';

export class FixedClock extends Clock {
  constructor(public current: Date) {
    super();
  }

  now(): Date {
    return new Date(this.current.getTime());
  }
}
