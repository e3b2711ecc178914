export { validateRequired, formatProblems, REQUIRED_FIELDS } from './validator.js';
export type { ValidationProblem } from './validator.js';
