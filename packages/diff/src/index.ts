export * from './domain/index.js';
export { PlanParseError, parsePlanDocument } from './sources/plan-parser.js';
export * from './reporting/index.js';
