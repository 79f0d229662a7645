export { ComparisonEngine, createComparisonEngine } from './comparison-engine.js';
export type { ComparisonResult } from './comparison-engine.js';
