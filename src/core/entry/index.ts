export { greet, formatSummary, type Summary } from './greet.js';
export { main, type MainOptions } from './main.js';
