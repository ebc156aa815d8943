/**
 * Benchmark result formatting utilities
 */

import type { Bench, Task } from 'tinybench';

export interface FormattedResult {
  name: string;
  ops: number;
  mean: number;
  p75: number;
  p99: number;
  stdDev: number;
  margin: number;
  samples: number;
  cv: number; // Coefficient of variation
}

// tinybench reports milliseconds
const MS_TO_NS = 1_000_000;

/**
 * Format a single benchmark task result, in nanoseconds
 */
export function formatTaskResult(name: string, task: Task): FormattedResult | null {
  const result = task.result;
  if (!result) {
    return null;
  }
  if (result.error !== undefined) {
    throw new Error(`Benchmark ${name} failed`, { cause: result.error });
  }

  const meanNs = result.mean * MS_TO_NS;
  const stdDevNs = result.sd * MS_TO_NS;

  return {
    name,
    ops: result.hz,
    mean: meanNs,
    p75: result.p75 * MS_TO_NS,
    p99: result.p99 * MS_TO_NS,
    stdDev: stdDevNs,
    margin: result.moe * MS_TO_NS,
    samples: result.samples.length,
    cv: meanNs > 0 ? stdDevNs / meanNs : 0,
  };
}

/**
 * Format all benchmark results from a Bench instance
 */
export function formatBenchResults(bench: Bench): FormattedResult[] {
  const results: FormattedResult[] = [];
  for (const task of bench.tasks) {
    const formatted = formatTaskResult(task.name, task);
    if (formatted) {
      results.push(formatted);
    }
  }
  return results;
}

/**
 * Render a latency with a unit that fits its magnitude
 */
export function formatLatency(ns: number): string {
  if (ns >= 1_000_000) {
    return `${(ns / 1_000_000).toFixed(3)}ms`;
  }
  if (ns >= 1_000) {
    return `${(ns / 1_000).toFixed(1)}μs`;
  }
  return `${ns.toFixed(0)}ns`;
}

/**
 * Create a markdown table from benchmark results
 */
export function resultsToMarkdownTable(results: FormattedResult[]): string {
  const headers = ['Name', 'Ops/sec', 'Mean', 'P75', 'P99', 'Std Dev', 'Margin', 'Samples'];
  const separator = headers.map((h) => '-'.repeat(h.length));

  const rows = results.map((r) => [
    r.name,
    r.ops.toFixed(2),
    formatLatency(r.mean),
    formatLatency(r.p75),
    formatLatency(r.p99),
    formatLatency(r.stdDev),
    `±${formatLatency(r.margin)}`,
    String(r.samples),
  ]);

  const table = [headers.join(' | '), separator.join(' | '), ...rows.map((row) => row.join(' | '))];

  return table.join('\n');
}
