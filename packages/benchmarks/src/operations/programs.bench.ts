/**
 * Assembly and interpretation benchmarks
 */

import { bench, describe } from 'vitest';
import { cpu } from '@einsum-ir/backend-cpu';
import { MATRIX_SIZES, MLP_SIZES } from '../utils/sizes';
import { feedInputs, matmulWorkload, mlpWorkload } from '../workloads';

const workloads = [...MATRIX_SIZES.map(matmulWorkload), ...MLP_SIZES.map(mlpWorkload)];

describe('program assembly', () => {
  for (const workload of workloads) {
    bench(`assemble ${workload.name}`, () => {
      workload.build();
    });
  }
});

describe('interpretation', () => {
  for (const workload of workloads) {
    const executable = cpu.compile(workload.build());
    feedInputs(executable);

    bench(`run ${workload.name}`, async () => {
      await executable.run();
    });
  }
});
