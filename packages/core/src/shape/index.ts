/**
 * Shape System
 *
 * Concrete shapes, broadcasting, and the symbolic dimensions that shape
 * inference resolves into them.
 */

export { RuntimeShape, LogicalShape, MAX_TENSOR_SIZE } from './runtime';

export { BroadcastManager, canBroadcast, broadcastShapes } from './broadcasting';

export {
  TensorDim,
  SymbolicEnvironment,
  constDim,
  toDimNode,
  formatDim,
  dimNodesEqual,
  type DimNode,
  type DimLike,
  type DimBinaryOp,
} from './symbolic';
