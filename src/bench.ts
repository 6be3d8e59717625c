/**
 * Timing of the decode strategies over a recorded session.
 *
 * Every strategy decodes the same lines the same number of times; the first
 * pass is a warm-up and is not counted.
 */

import { performance } from "perf_hooks";
import { DECODERS, STRATEGIES, type DecodeStrategy } from "./decode.js";

export interface StrategyTiming {
  strategy: DecodeStrategy;
  iterations: number;
  lines: number;
  totalMs: number;
  /** Mean cost of decoding one line, in microseconds. */
  perLineUs: number;
  /** Lines that failed to decode on a single pass, including non-JSON ones. */
  errors: number;
}

export function benchmark(
  lines: string[],
  iterations: number,
  strategies: readonly DecodeStrategy[] = STRATEGIES,
): StrategyTiming[] {
  const input = lines.filter((l) => l.trim() !== "");
  return strategies.map((strategy) => {
    const decode = DECODERS[strategy];

    // Lines that are not JSON count as errors and are left out of the timing.
    let errors = 0;
    const timed: string[] = [];
    for (const line of input) {
      try {
        if (!decode(line).ok) errors++;
        timed.push(line);
      } catch (e) {
        if (!(e instanceof SyntaxError)) throw e;
        errors++;
      }
    }

    const start = performance.now();
    for (let i = 0; i < iterations; i++) {
      for (const line of timed) decode(line);
    }
    const totalMs = performance.now() - start;
    const decodes = iterations * timed.length;

    return {
      strategy,
      iterations,
      lines: input.length,
      totalMs,
      perLineUs: decodes === 0 ? 0 : (totalMs * 1000) / decodes,
      errors,
    };
  });
}

export function formatTiming(t: StrategyTiming): string {
  return (
    `${t.strategy.padEnd(8)} ${t.perLineUs.toFixed(2).padStart(9)} µs/line` +
    `  (${t.lines} lines × ${t.iterations}, ${t.totalMs.toFixed(1)} ms, ${t.errors} errors)`
  );
}
