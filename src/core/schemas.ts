import { z } from 'zod';

/**
 * Wire schemas shared by the HTTP server and its client
 */
export const JobStatusSchema = z.enum(['PENDING', 'IN_PROGRESS', 'COMPLETED', 'FAILED', 'CANCELLED']);

export const JobInputSchema = z
  .object({
    wait_time: z
      .number({ invalid_type_error: 'wait_time must be a number' })
      .finite()
      .nonnegative('wait_time must be >= 0')
      .optional(),
  })
  .passthrough();

export const SubmitRequestSchema = z.object({
  input: JobInputSchema,
});

export const JobOutputSchema = z.object({
  result_text: z.string(),
  wait_time: z.number(),
  input_data: JobInputSchema,
});

export const SubmitResponseSchema = z.object({
  id: z.string().min(1),
  status: JobStatusSchema,
});

export const StatusResponseSchema = z.object({
  id: z.string().min(1),
  status: JobStatusSchema,
  output: JobOutputSchema.optional(),
  error: z.string().optional(),
});

export const CancelResponseSchema = z.object({
  id: z.string().min(1),
  status: JobStatusSchema,
  cancelled: z.boolean(),
});

export const HealthResponseSchema = z.object({
  status: z.string(),
  active_jobs: z.number().optional(),
  total_jobs: z.number().optional(),
});

export const JobSnapshotSchema = z.object({
  id: z.string(),
  status: JobStatusSchema,
  input: JobInputSchema,
  created_at: z.string(),
  started_at: z.string().optional(),
  completed_at: z.string().optional(),
  output: JobOutputSchema.optional(),
  error: z.string().optional(),
  executionTime: z.number().optional(),
});

export const ResetResponseSchema = z.object({
  message: z.string(),
  cleared: z.number(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  details: z
    .array(z.object({ path: z.string(), message: z.string() }))
    .optional(),
});

export const JobOutcomeSchema = z.enum([
  'COMPLETED',
  'FAILED',
  'CANCELLED',
  'CANCELLED_AFTER_START',
  'TIMEOUT',
  'TRANSPORT_ERROR',
  'NOT_SUBMITTED',
]);

const NumericStatsSchema = z.object({
  mean: z.number(),
  median: z.number(),
  total: z.number(),
  min: z.number(),
  max: z.number(),
});

// stored batch summaries are read back through this
export const BatchSummarySchema = z.object({
  timestamp: z.string(),
  workers: z.number(),
  total: z.number(),
  successful: z.number(),
  failed: z.number(),
  outcomes: z.object({
    COMPLETED: z.number(),
    FAILED: z.number(),
    CANCELLED: z.number(),
    CANCELLED_AFTER_START: z.number(),
    TIMEOUT: z.number(),
    TRANSPORT_ERROR: z.number(),
    NOT_SUBMITTED: z.number(),
  }),
  wallTimeMs: z.number(),
  throughput: z.number(),
  waitTime: NumericStatsSchema,
  totalTime: NumericStatsSchema,
  comparison: z
    .object({
      sequentialTimeMs: z.number(),
      parallelTimeMs: z.number(),
      speedup: z.number(),
      efficiency: z.number(),
      timeSavedMs: z.number(),
    })
    .optional(),
});
