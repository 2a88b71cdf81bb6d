import { z } from 'zod';

// --- Create Job ---

export const CreateJobSchema = z.object({
  curp: z.string().trim().min(1).max(64),
});

export type CreateJobInput = z.infer<typeof CreateJobSchema>;

// --- Batch Create Jobs ---

export const BatchCreateJobsSchema = z.object({
  curps: z.array(z.string().trim().min(1).max(64)).min(1).max(20),
});

export type BatchCreateJobsInput = z.infer<typeof BatchCreateJobsSchema>;
