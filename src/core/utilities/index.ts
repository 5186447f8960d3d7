export { PI, add, assertSafeInteger } from './math.js';
export { Counter } from './counter.js';
