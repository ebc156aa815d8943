/**
 * Program benchmark runner
 *
 * Measures, per workload, assembling the program from a fresh trace and
 * running an already compiled program on the interpreter.
 */

import { Bench, type Options } from 'tinybench';
import { makeLogger } from '@einsum-ir/core';
import { cpu } from '@einsum-ir/backend-cpu';
import { getBenchmarkConfig } from '../utils/config';
import { formatBenchResults, type FormattedResult } from '../utils/formatting';
import { MATRIX_SIZES, MLP_SIZES } from '../utils/sizes';
import { feedInputs, matmulWorkload, mlpWorkload, type Workload } from '../workloads';

const logger = makeLogger('bench');

export function defaultWorkloads(): Workload[] {
  return [...MATRIX_SIZES.map(matmulWorkload), ...MLP_SIZES.map(mlpWorkload)];
}

export async function runProgramBenchmarks(
  options: Options = getBenchmarkConfig(),
  workloads: readonly Workload[] = defaultWorkloads(),
): Promise<FormattedResult[]> {
  const bench = new Bench(options);

  for (const workload of workloads) {
    const executable = cpu.compile(workload.build());
    feedInputs(executable);

    bench.add(`assemble ${workload.name}`, () => {
      workload.build();
    });
    bench.add(`run ${workload.name}`, async () => {
      await executable.run();
    });
  }

  await bench.warmup();
  await bench.run();

  const results = formatBenchResults(bench);
  for (const result of results) {
    logger.info(`${result.name}: ${result.ops.toFixed(2)} ops/sec`, { samples: result.samples });
  }
  return results;
}
