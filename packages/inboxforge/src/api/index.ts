export { createApp } from './server.js';
export type { AppDeps } from './server.js';
export { errorHandler, validateBody } from './middleware/index.js';
export { CreateJobSchema, BatchCreateJobsSchema } from './schemas/index.js';
export type { CreateJobInput, BatchCreateJobsInput } from './schemas/index.js';
