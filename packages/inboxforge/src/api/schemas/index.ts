export { CreateJobSchema, BatchCreateJobsSchema } from './job.js';
export type { CreateJobInput, BatchCreateJobsInput } from './job.js';
