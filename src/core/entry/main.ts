/**
 * Entry routine: builds a user, runs the utilities and prints the results.
 */
import { logger } from '../../utils/logger.js';
import { add, Counter, PI } from '../utilities/index.js';
import { createUser, Status } from '../models/index.js';
import { greet, formatSummary } from './greet.js';

export interface MainOptions {
  /** Line sink. Defaults to console.log. */
  write?: (line: string) => void;
}

/**
 * Run the fixed sequence and write two lines. Returns the lines written.
 */
export function main(options: MainOptions = {}): string[] {
  const write = options.write ?? ((line: string) => console.log(line));
  const log = logger.child('main');

  const user = createUser('Ada', Status.ACTIVE);
  log.debug('Created user', { name: user.name, status: user.status });

  const total = add(2, 3);
  const counter = new Counter(1);
  counter.inc();
  log.debug('Computed values', { total, counter: counter.value });

  const lines = [
    greet(user.name),
    formatSummary({ total, pi: PI, counter: counter.value }),
  ];
  for (const line of lines) {
    write(line);
  }
  return lines;
}
