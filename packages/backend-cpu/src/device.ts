/**
 * CPU device implementation
 *
 * The device compiles assembled programs into {@link CPUExecutable}s that
 * interpret each scheduled operation over host typed arrays.
 */

import type { Program } from '@einsum-ir/core';
import { CPUExecutable } from './executable';

export class CPUDevice {
  /**
   * Device identifiers
   */
  readonly id = 'cpu:0';
  readonly type = 'cpu';

  compile(program: Program): CPUExecutable {
    return new CPUExecutable(program);
  }
}
