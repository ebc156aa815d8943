/**
 * Tensor graph construction
 */

export { TensorGraph } from './graph';
export { Tensor, type TensorLike } from './tensor';
export { select, cast, shape, index, prng, type PrngResult } from './ops';
export {
  Literal,
  float,
  int,
  bool,
  formatLiteral,
  BITWISE_OPS,
  COMPARE_OPS,
  type LiteralKind,
  type LiteralValue,
  type UnaryOp,
  type ArithmeticOp,
  type BitwiseOp,
  type CompareOp,
  type BinaryOp,
  type AggregationOp,
  type CombineOp,
  type TensorNode,
  type NodeKind,
  type PlaceholderNode,
  type ConstantNode,
  type UnaryNode,
  type BinaryNode,
  type SelectNode,
  type CastNode,
  type ShapeNode,
  type IndexNode,
  type ReshapeNode,
  type PrngNode,
  type PrngStateNode,
  type ContractionNode,
  type ContractionAccess,
} from './nodes';
