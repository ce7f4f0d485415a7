import { describe, it, expect } from 'vitest';

import { TicketApiError } from '../../src/infrastructure/errors/TicketApiError.js';
import { formatError } from '../../src/utils/errors.js';

describe('formatError', () => {
  it('explains missing tickets', () => {
    const error = new TicketApiError('http://localhost:3030/jotforms/x/status', 'Ticket API error: Not Found', 404);
    expect(formatError(error, 'Failed to update status of ticket x')).toBe(
      'Failed to update status of ticket x - Not found. The ticket may have been removed from the backend.'
    );
  });

  it('points at the backend URL when the connection is refused', () => {
    const error = new TicketApiError('http://localhost:3030/jotforms', 'Request failed: connect ECONNREFUSED 127.0.0.1:3030');
    expect(formatError(error, 'Failed to load tickets')).toBe(
      'Failed to load tickets - Backend unreachable. Check TICKET_API_URL and that the service is running.'
    );
  });

  it('suggests a longer timeout', () => {
    const error = new TicketApiError('http://localhost:3030/jotforms', 'Request timeout after 10000ms');
    expect(formatError(error, 'Failed to load tickets')).toBe(
      'Failed to load tickets - Request timed out. Try again or raise TICKET_API_TIMEOUT_MS.'
    );
  });

  it('falls back to the raw message', () => {
    expect(formatError(new Error('boom'), 'Unexpected error')).toBe('Unexpected error - boom');
    expect(formatError('plain string', 'Unexpected error')).toBe('Unexpected error - plain string');
  });
});
