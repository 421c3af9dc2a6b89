export type { UnitOutcome, UnitContext, TransformUnit } from './types.js';
export { CONTINUE, DROP, fail } from './types.js';
