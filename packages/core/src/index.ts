// Types
export * from './types/index.js';

// Errors
export { PawPlanError, ValidationError } from './errors.js';

// Parsers
export * from './parsers/index.js';

// Model
export * from './model/index.js';

// Scheduling
export * from './scheduling/index.js';
