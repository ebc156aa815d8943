/**
 * Program assembly, inference and printing
 */

export {
  Program,
  type ProgramOptions,
  type ProgramOutput,
  type ProgramArgument,
  type ProgramResult,
  type ScheduledOp,
} from './program';
export {
  ShapeResolver,
  literalDType,
  type GraphView,
  type ResolverOptions,
  type ResolvedContraction,
  type ResolvedNode,
  type Resolution,
} from './resolver';
export { checkAssignCoverage } from './coverage';
export { printProgram } from './printer';
