/**
 * Compiled program bound to host buffers
 */

import type { Program, Tensor } from '@einsum-ir/core';
import { makeLogger } from '@einsum-ir/core';
import { BufferView, HostBuffer } from './data';
import { ExecutionError } from './errors';
import { executeOperation, type RunState } from './operations';

const logger = makeLogger('cpu');

/**
 * Identifies an argument or a result: a tensor of the program, an argument
 * name, or a position
 */
export type BufferKey = Tensor | string | number;

/**
 * A program ready to run on the interpreter
 *
 * Argument buffers keep their contents between runs; every run recomputes
 * all results from them.
 *
 * @example
 * const exe = cpu.compile(new Program('add', [A.add(B)]));
 * exe.input('A').copyFrom([1, 2]);
 * exe.input('B').copyFrom([3, 4]);
 * await exe.run();
 * exe.output(0).toArray(); // [4, 6]
 */
export class CPUExecutable {
  private readonly inputs: readonly HostBuffer[];
  private readonly outputs: readonly HostBuffer[];
  private runs = 0;

  constructor(readonly program: Program) {
    this.inputs = program.inputs.map((arg) => new HostBuffer(arg.shape));
    this.outputs = program.outputs.map((out) => new HostBuffer(out.shape));
    logger.debug('program compiled', {
      program: program.name,
      inputs: this.inputs.length,
      ops: program.ops.length,
    });
  }

  input(key: BufferKey): BufferView {
    const position = this.find(
      key,
      this.program.inputs.map((arg) => ({ id: arg.id, name: arg.name })),
      'argument',
    );
    const buffer = this.inputs[position];
    if (buffer === undefined) {
      throw new ExecutionError(`Program ${this.program.name} has no argument ${position}`);
    }
    const arg = this.program.inputs[position];
    return new BufferView(buffer, arg?.name ?? arg?.ref ?? String(position), true);
  }

  output(key: BufferKey): BufferView {
    const position = this.find(
      key,
      this.program.outputs.map((out) => ({ id: out.id, name: undefined })),
      'result',
    );
    const buffer = this.outputs[position];
    if (buffer === undefined) {
      throw new ExecutionError(`Program ${this.program.name} has no result ${position}`);
    }
    return new BufferView(buffer, `result ${position}`, false);
  }

  /**
   * Evaluate every scheduled operation and copy the results out
   */
  async run(): Promise<void> {
    this.runs++;
    const state: RunState = { values: new Map(), prngStates: new Map() };
    this.program.inputs.forEach((arg, position) => {
      const buffer = this.inputs[position];
      if (buffer !== undefined) {
        state.values.set(arg.id, buffer);
      }
    });

    for (const op of this.program.ops) {
      logger.trace(`executing ${op.ref}`, { kind: op.node.kind, run: this.runs });
      state.values.set(op.id, executeOperation(op, state));
    }

    this.program.outputs.forEach((out, position) => {
      const value = state.values.get(out.id);
      if (value === undefined) {
        throw new ExecutionError(`Result ${out.ref} was not computed`, { result: out.ref });
      }
      this.outputs[position]?.assign(value);
    });
    logger.debug('program run', { program: this.program.name, run: this.runs });
  }

  private find(
    key: BufferKey,
    entries: readonly { readonly id: number; readonly name: string | undefined }[],
    what: string,
  ): number {
    let position: number;
    if (typeof key === 'number') {
      position = key < entries.length ? key : -1;
    } else if (typeof key === 'string') {
      position = entries.findIndex((entry) => entry.name === key);
    } else {
      position = entries.findIndex((entry) => entry.id === key.id);
    }
    if (position < 0) {
      const label = typeof key === 'object' ? key.toString() : String(key);
      throw new ExecutionError(`Program ${this.program.name} has no ${what} ${label}`, {
        program: this.program.name,
      });
    }
    return position;
  }
}
