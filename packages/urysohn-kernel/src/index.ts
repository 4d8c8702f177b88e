// Public API
export type { Space, NormalityOracle } from './space.js';
export { CU } from './cu.js';
export type { CUOptions, CUReadback } from './cu.js';

// Evaluation
export { approx, approxByDefinition, descend } from './approx.js';
export type { Descent } from './approx.js';
export { limApprox, estimateLim, depthForTolerance, MAX_DEPTH, DEFAULT_TOLERANCE } from './lim.js';
export type { LimEstimate } from './lim.js';

// Continuity certificates
export { continuityNeighborhood, CONTRACTION } from './continuity.js';
export type { ContinuityCertificate } from './continuity.js';

// Separating functions
export { urysohn, build, SeparatingFunction } from './urysohn.js';
export type { SeparationOptions, SeparatorReadback } from './urysohn.js';
export { separateIntervals, separateRegions, separateFinite } from './api.js';
export type { IntervalSeparator, RegionSeparator, FiniteSeparator } from './api.js';

// Errors
export {
  UrysohnError, PreconditionViolatedError, OracleContractViolatedError, ToleranceError,
} from './errors.js';
export type { UrysohnErrorCode } from './errors.js';

// Real line
export type { Interval } from './spaces/intervals.js';
export {
  IntervalSet, interval, closedInterval, openInterval, singleton, atLeast, atMost,
  realLine, intervalOracle,
} from './spaces/intervals.js';

// Level sets over R^3
export type { Vec3 } from './vec3.js';
export { vec3, distance } from './vec3.js';
export type { Term } from './spaces/field.js';
export {
  Field, Constant, Sphere, Box, HalfSpace, Union, Intersect, Translate, Combination,
  OpenRegion, ClosedRegion, levelSetSpace, levelSetOracle,
  sphere, box, halfSpace, openRegion, closedRegion,
} from './spaces/field.js';

// Finite spaces
export { FiniteSet, FiniteSpace, searchOracle } from './spaces/finite.js';
