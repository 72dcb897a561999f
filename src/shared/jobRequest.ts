/**
 * Inbound job request: what a caller (CLI, MCP tool) hands to the pipeline.
 */

import { z } from 'zod';
import { InvalidRequestError } from './errors.js';
import type { Result } from './types.js';
import { ok, err } from './types.js';

export const DEFAULT_TITLE = 'Standard Operating Procedure';
export const DEFAULT_INTERVAL_SECONDS = 10;

export const JobRequestSchema = z.object({
  url: z.string({ required_error: 'url is required' }).trim().min(1, 'url is required'),
  title: z.string().trim().min(1, 'title must not be empty').default(DEFAULT_TITLE),
  /** Numbers and numeric strings such as "15"; fractions truncate toward zero */
  interval: z.coerce
    .number({ invalid_type_error: 'interval must be a number' })
    .finite('interval must be a number')
    .transform(Math.trunc)
    .pipe(z.number().min(1, 'interval must be at least 1 second'))
    .default(DEFAULT_INTERVAL_SECONDS),
});

export type JobRequest = z.infer<typeof JobRequestSchema>;
export type JobRequestInput = z.input<typeof JobRequestSchema>;

export function parseJobRequest(input: unknown): Result<JobRequest, InvalidRequestError> {
  const parsed = JobRequestSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      new InvalidRequestError(
        parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        )
      )
    );
  }
  return ok(parsed.data);
}
