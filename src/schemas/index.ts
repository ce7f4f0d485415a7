/**
 * Zod Schemas for the maintenance desk client
 *
 * Runtime validation for backend payloads and environment configuration.
 */

import { z } from 'zod';

import { API_TIMEOUT_MS, DEFAULT_API_URL } from '../constants.js';
import { TicketStatus } from '../core/entities/Ticket.js';

// ============================================================================
// Backend Payloads
// ============================================================================

export const SubmitterNamePayloadSchema = z.object({
  first: z.string(),
  last: z.string()
});

export const SubmissionDatePayloadSchema = z.object({
  date: z.string().describe('Submission date, YYYY-MM-DD'),
  time: z.string()
});

/**
 * One element of GET /jotforms.
 * `status` stays a plain string here; unknown values are normalised when mapped.
 */
export const TicketPayloadSchema = z.object({
  id: z.string().min(1, 'Ticket id must not be empty'),
  submitter_name: SubmitterNamePayloadSchema,
  created_at: SubmissionDatePayloadSchema,
  location: z.string(),
  exhibit_name: z.string(),
  description: z.string(),
  priority_level: z.string(),
  department: z.string(),
  status: z.string()
});

export type TicketPayload = z.infer<typeof TicketPayloadSchema>;

export const TicketListPayloadSchema = z.array(TicketPayloadSchema);

/**
 * Body of POST /jotforms/:id/status
 */
export const StatusUpdateBodySchema = z.object({
  new_status: z.nativeEnum(TicketStatus)
}).strict();

// ============================================================================
// Configuration
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const UpdateFailurePolicySchema = z.enum(['keep', 'rollback']);

export type UpdateFailurePolicy = z.infer<typeof UpdateFailurePolicySchema>;

export const EnvironmentSchema = z.object({
  TICKET_API_URL: z.string()
    .default(DEFAULT_API_URL)
    .refine(value => {
      try {
        const { protocol } = new URL(value);
        return protocol === 'http:' || protocol === 'https:';
      } catch {
        return false;
      }
    }, { message: 'TICKET_API_URL must be an http(s) URL' }),
  TICKET_API_TIMEOUT_MS: z.coerce.number()
    .int('TICKET_API_TIMEOUT_MS must be an integer')
    .positive('TICKET_API_TIMEOUT_MS must be positive')
    .default(API_TIMEOUT_MS),
  STATUS_UPDATE_FAILURE: UpdateFailurePolicySchema.default('keep'),
  LOG_LEVEL: LogLevelSchema.default('info'),
  LOG_FILE: z.string().optional()
});

/**
 * Render zod issues as a single line: `path: message; path: message`
 */
export function summarizeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}
