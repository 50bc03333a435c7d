/**
 * Timing utilities
 * Measures decode, resize and render passes and reports them through debug()
 */

import { debug } from './debug.js';

export function time<T>(fn: () => T, label: string): T {
  const timer = new Timer(label);
  const result = fn();
  timer.end();
  return result;
}

export async function timeAsync<T>(fn: () => Promise<T>, label: string): Promise<T> {
  const timer = new Timer(label);
  const result = await fn();
  timer.end();
  return result;
}

export class Timer {
  private label: string;
  private start: number;

  constructor(label: string) {
    this.label = label;
    this.start = performance.now();
  }

  end(): number {
    const duration = performance.now() - this.start;
    debug(`${this.label}: ${duration.toFixed(2)}ms`);
    return duration;
  }
}
