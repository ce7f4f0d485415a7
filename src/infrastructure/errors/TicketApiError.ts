/**
 * Error raised by the ticket backend client.
 * Carries the HTTP status code (absent for transport failures and
 * malformed payloads) so callers don't have to match on message text.
 */
export class TicketApiError extends Error {
  public readonly statusCode: number | undefined;
  public readonly endpoint: string;

  constructor(endpoint: string, message: string, statusCode?: number) {
    super(message);
    this.name = 'TicketApiError';
    this.endpoint = endpoint;
    this.statusCode = statusCode;
  }
}
