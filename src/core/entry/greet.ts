/** Greeting line for `name`. */
export function greet(name: string): string {
  return `Hello, ${name}`;
}

export interface Summary {
  total: number;
  pi: number;
  counter: number;
}

/** Single-line `key=value` summary of the computed values. */
export function formatSummary(summary: Summary): string {
  return `total=${summary.total}, pi=${summary.pi}, counter=${summary.counter}`;
}
