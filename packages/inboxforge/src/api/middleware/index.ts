export { validateBody } from './validation.js';
export type { ValidatedBody } from './validation.js';
export { errorHandler } from './error-handler.js';
