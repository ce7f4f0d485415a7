import { TicketApiError } from '../infrastructure/errors/TicketApiError.js';

/**
 * Format error message with an operator-facing hint
 */
export function formatError(error: unknown, context: string): string {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof TicketApiError && error.statusCode === 404) {
    return `${context} - Not found. The ticket may have been removed from the backend.`;
  }
  if (message.includes('ECONNREFUSED')) {
    return `${context} - Backend unreachable. Check TICKET_API_URL and that the service is running.`;
  }
  if (message.includes('timeout')) {
    return `${context} - Request timed out. Try again or raise TICKET_API_TIMEOUT_MS.`;
  }

  return `${context} - ${message}`;
}
