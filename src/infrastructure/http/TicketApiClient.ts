import https from 'https';
import http from 'http';

import { API_TIMEOUT_MS, TICKETS_PATH } from '../../constants.js';
import { type Ticket, TicketStatus } from '../../core/entities/Ticket.js';
import type { ITicketRepository } from '../../core/repositories/ITicketRepository.js';
import { parseTicketStatus } from '../../core/policies/StatusMachine.js';
import {
  StatusUpdateBodySchema,
  TicketListPayloadSchema,
  summarizeIssues,
  type TicketPayload
} from '../../schemas/index.js';
import { TicketApiError } from '../errors/TicketApiError.js';
import type { LoggerLike } from '../logging/Logger.js';

export interface TicketApiClientOptions {
  readonly apiUrl: string;
  readonly timeoutMs?: number;
  readonly logger?: LoggerLike;
}

/**
 * Ticket backend client
 * Handles HTTP communication with the ticket REST API
 */
export class TicketApiClient implements ITicketRepository {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: LoggerLike | undefined;

  constructor(options: TicketApiClientOptions) {
    this.apiUrl = options.apiUrl;
    this.timeoutMs = options.timeoutMs ?? API_TIMEOUT_MS;
    this.logger = options.logger;
  }

  /**
   * Fetch all tickets
   * GET /jotforms
   */
  async fetchAll(): Promise<Ticket[]> {
    const url = this.endpoint(TICKETS_PATH);
    const response = await this.makeRequest('GET', url);

    const parsed = TicketListPayloadSchema.safeParse(response);
    if (!parsed.success) {
      throw new TicketApiError(url, `Invalid ticket list payload: ${summarizeIssues(parsed.error)}`);
    }

    return parsed.data.map(payload => this.toTicket(payload));
  }

  /**
   * Update a ticket's status
   * POST /jotforms/:id/status
   */
  async updateStatus(id: string, status: TicketStatus): Promise<void> {
    const url = this.endpoint(`${TICKETS_PATH}/${encodeURIComponent(id)}/status`);
    const body = StatusUpdateBodySchema.parse({ new_status: status });
    await this.makeRequest('POST', url, body);
  }

  /**
   * Map a wire ticket onto the domain entity
   * Unknown statuses are treated as Open so the ticket still has a place in the cycle
   */
  private toTicket(payload: TicketPayload): Ticket {
    let status = parseTicketStatus(payload.status);
    if (status === undefined) {
      this.logger?.warn(`Ticket ${payload.id} has unknown status "${payload.status}", treating it as ${TicketStatus.OPEN}`);
      status = TicketStatus.OPEN;
    }

    return {
      id: payload.id,
      submitter: {
        first: payload.submitter_name.first,
        last: payload.submitter_name.last
      },
      submittedAt: {
        date: payload.created_at.date,
        time: payload.created_at.time
      },
      location: payload.location,
      exhibitName: payload.exhibit_name,
      description: payload.description,
      priority: payload.priority_level,
      department: payload.department,
      status
    };
  }

  private endpoint(path: string): string {
    // Keep any path prefix of the configured base URL
    const base = this.apiUrl.endsWith('/') ? this.apiUrl : `${this.apiUrl}/`;
    return new URL(path.replace(/^\//, ''), base).toString();
  }

  /**
   * Make HTTP request to the ticket API
   */
  private async makeRequest(
    method: 'GET' | 'POST',
    url: string,
    body?: unknown
  ): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const parsedUrl = new URL(url);
      const isHttps = parsedUrl.protocol === 'https:';
      const payload = body === undefined ? undefined : JSON.stringify(body);

      const headers: http.OutgoingHttpHeaders = { Accept: 'application/json' };
      if (payload !== undefined) {
        headers['Content-Type'] = 'application/json';
        headers['Content-Length'] = Buffer.byteLength(payload);
      }

      const options: http.RequestOptions = {
        method,
        hostname: parsedUrl.hostname,
        port: parsedUrl.port || (isHttps ? 443 : 80),
        path: parsedUrl.pathname + parsedUrl.search,
        headers
      };

      this.logger?.debug(`${method} ${url}`);

      const client = isHttps ? https : http;
      const req = client.request(options, (res) => {
        let data = '';

        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          data += chunk;
        });

        res.on('end', () => {
          const statusCode = res.statusCode ?? 500;

          // Success
          if (statusCode >= 200 && statusCode < 300) {
            if (data.trim().length === 0) {
              resolve(null);
              return;
            }
            // Try to parse JSON, fallback to raw text
            try {
              resolve(JSON.parse(data));
            } catch {
              resolve(data);
            }
            return;
          }

          // Error handling
          const errorMap: Record<number, string> = {
            400: 'Bad Request - Invalid parameters',
            404: 'Not Found - Unknown ticket or endpoint',
            500: 'Internal Server Error - Ticket backend error'
          };

          const errorMessage = errorMap[statusCode] ?? `HTTP ${statusCode}${data ? ` - ${data}` : ''}`;
          reject(new TicketApiError(url, `Ticket API error: ${errorMessage}`, statusCode));
        });

        res.on('error', (error) => {
          reject(new TicketApiError(url, `Response failed: ${error.message}`));
        });
      });

      req.setTimeout(this.timeoutMs, () => {
        req.destroy();
        reject(new TicketApiError(url, `Request timeout after ${this.timeoutMs}ms`));
      });

      req.on('error', (error) => {
        reject(new TicketApiError(url, `Request failed: ${error.message}`));
      });

      if (payload !== undefined) {
        req.write(payload);
      }

      req.end();
    });
  }
}
