import { describe, it, expect } from 'vitest';
import { Counter } from '../../../../src/core/utilities/counter.js';
import { ValidationError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('Counter', () => {
  it('should start at 0 by default', () => {
    expect(new Counter().value).toBe(0);
  });

  it('should start at the given value', () => {
    expect(new Counter(5).value).toBe(5);
  });

  it('should return the post-increment value from inc', () => {
    const counter = new Counter(1);

    expect(counter.inc()).toBe(2);
    expect(counter.value).toBe(2);
  });

  it('should reach start + n after n increments', () => {
    const counter = new Counter(3);
    const returned: number[] = [];

    for (let i = 0; i < 4; i++) {
      returned.push(counter.inc());
    }

    expect(returned).toEqual([4, 5, 6, 7]);
    expect(counter.value).toBe(7);
  });

  it('should keep counters independent', () => {
    const a = new Counter();
    const b = new Counter();

    a.inc();
    a.inc();

    expect(a.value).toBe(2);
    expect(b.value).toBe(0);
  });

  it('should refuse writes to value from outside', () => {
    const counter = new Counter(3);

    expect(Reflect.set(counter, 'value', 0)).toBe(false);
    expect(counter.value).toBe(3);
  });

  it('should reject a non-integer start', () => {
    expect(() => new Counter(0.5)).toThrow(ValidationError);
    expect(() => new Counter(0.5)).toThrow('Expected start to be a safe integer, got 0.5');
  });

  it('should not change value when inc overflows', () => {
    const counter = new Counter(Number.MAX_SAFE_INTEGER);

    let thrown: unknown;
    try {
      counter.inc();
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toMatchObject({ code: ErrorCodes.INTEGER_OVERFLOW });
    expect(counter.value).toBe(Number.MAX_SAFE_INTEGER);
  });
});
