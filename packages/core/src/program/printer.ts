/**
 * Textual program dump
 *
 * The dump is deterministic: the same graph and outputs always print the
 * same text, which makes it suitable for golden tests.
 *
 * @example
 * func @dot(%arg0: tensor<3x3xf32> {name = "B"}, %arg1: tensor<3x3xf32> {name = "A"}) -> tensor<3x3xf32> {
 *   %0 = contraction add, mul %arg1, %arg0 {idxs = [i, j, k], sink = (d0, d1), srcs = [(d0, d2), (d2, d1)]} : tensor<3x3xf32>
 *   return %0 : tensor<3x3xf32>
 * }
 */

import { AssemblyError, assertExhaustiveSwitch } from '../errors';
import type { AffineExpr } from '../contraction/affine';
import { formatLiteral } from '../tensor/nodes';
import type { Program, ScheduledOp } from './program';

function tuple(exprs: readonly AffineExpr[]): string {
  return `(${exprs.map((expr) => expr.toString()).join(', ')})`;
}

function formatOp(op: ScheduledOp): string {
  const { node, operands } = op;
  const args = operands.join(', ');
  switch (node.kind) {
    case 'placeholder':
      throw new AssemblyError(`Placeholder ${op.ref} cannot be printed as an operation`);
    case 'constant':
      return `const ${formatLiteral(node.literal.value, node.literal.kind)}`;
    case 'unary':
    case 'binary':
      return `${node.op} ${args}`;
    case 'select':
    case 'cast':
    case 'shape':
    case 'reshape':
    case 'prng':
    case 'prng_state':
      return `${node.kind} ${args}`;
    case 'index':
      return `index ${args} {axis = ${node.axis}}`;
    case 'contraction': {
      const resolved = op.contraction;
      if (resolved === undefined) {
        return `contraction ${node.aggregation}, ${node.combine} ${args}`;
      }
      const sources = node.defaultOperand === undefined ? operands : operands.slice(1);
      const attrs = [
        `idxs = [${resolved.indexes.map((index, i) => index.name ?? `d${i}`).join(', ')}]`,
        `sink = ${tuple(resolved.sink)}`,
        `srcs = [${resolved.sources.map(tuple).join(', ')}]`,
      ];
      if (resolved.constraints.length > 0) {
        attrs.push(`cons = (${resolved.constraints.map((c) => `${c.toString()} >= 0`).join(', ')})`);
      }
      if (node.noReduce) {
        attrs.push('no_reduce');
      }
      if (node.defaultOperand !== undefined && operands[0] !== undefined) {
        attrs.push(`default = ${operands[0]}`);
      }
      return `contraction ${node.aggregation}, ${node.combine} ${sources.join(', ')} {${attrs.join(', ')}}`;
    }
    default:
      return assertExhaustiveSwitch(node);
  }
}

export function printProgram(program: Program): string {
  const params = program.inputs.map((arg) => {
    const attrs = arg.name === undefined ? '' : ` {name = "${arg.name}"}`;
    return `${arg.ref}: ${arg.shape.toTypeString()}${attrs}`;
  });
  const resultTypes = program.outputs.map((out) => out.shape.toTypeString());
  const results = resultTypes.length === 1 ? resultTypes.join('') : `(${resultTypes.join(', ')})`;

  const lines = [`func @${program.name}(${params.join(', ')}) -> ${results} {`];
  for (const op of program.ops) {
    lines.push(`  ${op.ref} = ${formatOp(op)} : ${op.shape.toTypeString()}`);
  }
  lines.push(
    `  return ${program.outputs.map((out) => out.ref).join(', ')} : ${resultTypes.join(', ')}`,
  );
  lines.push('}');
  return lines.join('\n');
}
