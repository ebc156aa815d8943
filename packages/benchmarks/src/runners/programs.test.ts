import { describe, it, expect } from 'vitest';
import { cpu } from '@einsum-ir/backend-cpu';
import { runProgramBenchmarks } from './programs';
import { BENCHMARK_PROFILES, getBenchmarkConfig } from '../utils/config';
import { generateSequentialData } from '../utils/data';
import { resultsToMarkdownTable } from '../utils/formatting';
import { feedInputs, matmulWorkload, mlpWorkload } from '../workloads';

describe('workloads', () => {
  it('should assemble and run a perceptron', async () => {
    const workload = mlpWorkload({ name: 'unit', shape: [4, 3, 2], elements: 18 });
    const program = workload.build();
    expect(program.inputs.map((arg) => arg.name)).toEqual([
      'bias2',
      'kernel2',
      'bias1',
      'kernel1',
      'input',
    ]);

    const executable = cpu.compile(program);
    feedInputs(executable);
    await executable.run();
    const [p0 = 0, p1 = 0] = executable.output(0).toArray().map(Number);
    expect(p0 + p1).toBeCloseTo(1, 5);
  });

  it('should multiply fed matrices', async () => {
    const executable = cpu.compile(matmulWorkload({ name: 'unit', shape: [2, 2], elements: 4 }).build());
    executable.input('A').copyFrom(generateSequentialData([2, 2], 1).data);
    executable.input('B').copyFrom(generateSequentialData([2, 2], 5).data);
    await executable.run();
    expect(executable.output(0).toArray()).toEqual([19, 22, 43, 50]);
  });
});

describe('runProgramBenchmarks', () => {
  it('should measure assembly and interpretation of every workload', async () => {
    const results = await runProgramBenchmarks(BENCHMARK_PROFILES.smoke, [
      matmulWorkload({ name: 'unit', shape: [2, 2], elements: 4 }),
    ]);
    expect(results.map((result) => result.name)).toEqual([
      'assemble matmul unit 2x2',
      'run matmul unit 2x2',
    ]);
    for (const result of results) {
      expect(result.samples).toBeGreaterThanOrEqual(2);
      expect(result.ops).toBeGreaterThan(0);
    }
  });
});

describe('benchmark utilities', () => {
  it('should pick the profile named in the environment', () => {
    expect(getBenchmarkConfig({ BENCHMARK_PROFILE: 'quick' })).toBe(BENCHMARK_PROFILES.quick);
    expect(getBenchmarkConfig({ BENCHMARK_PROFILE: 'unknown' })).toBe(BENCHMARK_PROFILES.standard);
    expect(getBenchmarkConfig({})).toBe(BENCHMARK_PROFILES.standard);
  });

  it('should render results as a markdown table', () => {
    const table = resultsToMarkdownTable([
      {
        name: 'x',
        ops: 1234.5,
        mean: 1500,
        p75: 2_000_000,
        p99: 999,
        stdDev: 0,
        margin: 10,
        samples: 3,
        cv: 0,
      },
    ]);
    expect(table.split('\n')).toEqual([
      'Name | Ops/sec | Mean | P75 | P99 | Std Dev | Margin | Samples',
      '---- | ------- | ---- | --- | --- | ------- | ------ | -------',
      'x | 1234.50 | 1.5μs | 2.000ms | 999ns | 0ns | ±10ns | 3',
    ]);
  });
});
