/**
 * Elementwise operations for the CPU interpreter
 *
 * Operands are converted to the result dtype before the operation is
 * applied (comparisons use the join of the operand dtypes), and results wrap
 * on store like the fixed-width machine types they model.
 */

import type {
  ArithmeticOp,
  BinaryNode,
  BinaryOp,
  BitwiseOp,
  CompareOp,
  LogicalShape,
  RuntimeDType,
  UnaryNode,
  UnaryOp,
} from '@einsum-ir/core';
import { COMPARE_OPS, assertExhaustiveSwitch, joinDTypes } from '@einsum-ir/core';
import { HostBuffer } from '../data';
import { ExecutionError } from '../errors';
import { broadcastIndices, compareScalars, convertScalar, isTruthy, type Scalar } from '../utils';

// =============================================================================
// Scalar Kernels
// =============================================================================

/**
 * Integer division truncates toward zero; division by zero yields 0
 */
export function applyArithmetic(
  op: ArithmeticOp,
  a: Scalar,
  b: Scalar,
  dtype: RuntimeDType,
): Scalar {
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    switch (op) {
      case 'add':
        return a + b;
      case 'sub':
        return a - b;
      case 'mul':
        return a * b;
      case 'div':
        return b === 0n ? 0n : a / b;
      default:
        return assertExhaustiveSwitch(op);
    }
  }
  if (typeof a === 'number' && typeof b === 'number') {
    switch (op) {
      case 'add':
        return a + b;
      case 'sub':
        return a - b;
      case 'mul':
        // 32-bit products can exceed 2^53
        return dtype.isInteger && dtype.bitWidth === 32 ? Math.imul(a, b) : a * b;
      case 'div':
        if (dtype.isFloat) {
          return a / b;
        }
        return b === 0 ? 0 : Math.trunc(a / b);
      default:
        return assertExhaustiveSwitch(op);
    }
  }
  throw new ExecutionError(`Operands of ${op} are not both in the ${dtype.name} domain`);
}

function applyBitwise(op: BitwiseOp, a: Scalar, b: Scalar, dtype: RuntimeDType): Scalar {
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    switch (op) {
      case 'bit_and':
        return a & b;
      case 'bit_or':
        return a | b;
      case 'bit_xor':
        return a ^ b;
      case 'bit_shl':
        return a << b;
      case 'bit_shr':
        return a >> b;
      default:
        return assertExhaustiveSwitch(op);
    }
  }
  if (typeof a === 'number' && typeof b === 'number') {
    switch (op) {
      case 'bit_and':
        return a & b;
      case 'bit_or':
        return a | b;
      case 'bit_xor':
        return a ^ b;
      case 'bit_shl':
        return a << b;
      case 'bit_shr':
        return dtype.signed ? a >> b : a >>> b;
      default:
        return assertExhaustiveSwitch(op);
    }
  }
  throw new ExecutionError(`Operands of ${op} are not both in the ${dtype.name} domain`);
}

function applyCompare(op: CompareOp, a: Scalar, b: Scalar): boolean {
  const order = compareScalars(a, b);
  if (order === undefined) {
    return op === 'cmp_ne';
  }
  switch (op) {
    case 'cmp_eq':
      return order === 0;
    case 'cmp_ne':
      return order !== 0;
    case 'cmp_lt':
      return order < 0;
    case 'cmp_le':
      return order <= 0;
    case 'cmp_gt':
      return order > 0;
    case 'cmp_ge':
      return order >= 0;
    default:
      return assertExhaustiveSwitch(op);
  }
}

function isCompareOp(op: BinaryOp): op is CompareOp {
  return COMPARE_OPS.includes(op);
}

function isArithmeticOp(op: BinaryOp): op is ArithmeticOp {
  return op === 'add' || op === 'sub' || op === 'mul' || op === 'div';
}

export function applyUnary(op: UnaryOp, value: Scalar, dtype: RuntimeDType): Scalar {
  if (typeof value === 'bigint') {
    switch (op) {
      case 'neg':
        return -value;
      case 'abs':
        return value < 0n ? -value : value;
      case 'bit_not':
        return ~value;
      case 'exp':
      case 'log':
      case 'sqrt':
      case 'tanh':
        throw new ExecutionError(`${op} is not defined for ${dtype.name}`);
      default:
        return assertExhaustiveSwitch(op);
    }
  }
  switch (op) {
    case 'neg':
      return -value;
    case 'abs':
      return Math.abs(value);
    case 'exp':
      return Math.exp(value);
    case 'log':
      return Math.log(value);
    case 'sqrt':
      return Math.sqrt(value);
    case 'tanh':
      return Math.tanh(value);
    case 'bit_not':
      return ~value;
    default:
      return assertExhaustiveSwitch(op);
  }
}

// =============================================================================
// Buffer Kernels
// =============================================================================

function read(buffer: HostBuffer, offset: number, dtype: RuntimeDType): Scalar {
  const value = buffer.get(offset);
  return buffer.dtype === dtype ? value : convertScalar(value, dtype);
}

export function executeUnaryOp(node: UnaryNode, input: HostBuffer, shape: LogicalShape): HostBuffer {
  const output = new HostBuffer(shape);
  const dtype = shape.dtype;
  for (let i = 0; i < output.size; i++) {
    output.set(i, applyUnary(node.op, read(input, i, dtype), dtype));
  }
  return output;
}

/**
 * Elementwise binary operation with broadcasting
 */
export function executeBinaryOp(
  node: BinaryNode,
  lhs: HostBuffer,
  rhs: HostBuffer,
  shape: LogicalShape,
): HostBuffer {
  const output = new HostBuffer(shape);
  const dtype = shape.dtype;
  const { op } = node;
  const indices = broadcastIndices(shape.dims, [lhs.shape.dims, rhs.shape.dims]);
  // Comparisons produce bool; their operands meet in the lattice join
  const operandType = joinDTypes(lhs.dtype, rhs.dtype);

  for (const { outputIndex, inputOffsets } of indices) {
    const [left = 0, right = 0] = inputOffsets;
    if (isCompareOp(op)) {
      const holds = applyCompare(
        op,
        read(lhs, left, operandType),
        read(rhs, right, operandType),
      );
      output.set(outputIndex, holds ? 1 : 0);
    } else if (isArithmeticOp(op)) {
      const value = applyArithmetic(op, read(lhs, left, dtype), read(rhs, right, dtype), dtype);
      output.set(outputIndex, value);
    } else {
      const value = applyBitwise(op, read(lhs, left, dtype), read(rhs, right, dtype), dtype);
      output.set(outputIndex, value);
    }
  }
  return output;
}

export function executeSelectOp(
  condition: HostBuffer,
  whenTrue: HostBuffer,
  whenFalse: HostBuffer,
  shape: LogicalShape,
): HostBuffer {
  const output = new HostBuffer(shape);
  const dims = [condition.shape.dims, whenTrue.shape.dims, whenFalse.shape.dims];
  for (const { outputIndex, inputOffsets } of broadcastIndices(shape.dims, dims)) {
    const [c = 0, t = 0, f = 0] = inputOffsets;
    const truthy = isTruthy(condition.get(c));
    const source = truthy ? whenTrue : whenFalse;
    output.store(outputIndex, source.get(truthy ? t : f), source.dtype);
  }
  return output;
}

/**
 * Convert every element; floats truncate toward zero, integers wrap
 */
export function executeCastOp(input: HostBuffer, shape: LogicalShape): HostBuffer {
  const output = new HostBuffer(shape);
  for (let i = 0; i < output.size; i++) {
    output.store(i, input.get(i), input.dtype);
  }
  return output;
}
