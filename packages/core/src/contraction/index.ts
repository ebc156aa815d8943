/**
 * Contractions: index algebra, range inference and the builder
 */

export { TensorIndex, IndexExpr, Constraint, AffineExpr, type IndexLike } from './affine';
export {
  accessInequalities,
  boxVolume,
  deriveIndexRanges,
  forEachPoint,
  fromAffine,
  satisfies,
  type IndexRange,
  type Inequality,
} from './bounds';
export {
  ContractionBuilder,
  TensorAccess,
  cond,
  type ContractionSource,
  type SourceLike,
} from './builder';
