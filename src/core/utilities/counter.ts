import { add, assertSafeInteger } from './math.js';

/**
 * Monotonic integer counter. `inc` is the only way to change the value.
 */
export class Counter {
  private current: number;

  constructor(start: number = 0) {
    assertSafeInteger(start, 'start');
    this.current = start;
  }

  get value(): number {
    return this.current;
  }

  /**
   * Increment by one and return the new value.
   */
  inc(): number {
    this.current = add(this.current, 1);
    return this.current;
  }
}
