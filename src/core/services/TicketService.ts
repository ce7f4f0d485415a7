import type { ITicketRepository } from '../repositories/ITicketRepository.js';
import type { TicketStatus } from '../entities/Ticket.js';
import type { SessionState } from '../state/SessionState.js';
import { loadTickets } from '../state/TicketStore.js';
import type { LoggerLike } from '../../infrastructure/logging/Logger.js';

/**
 * Ticket Service - Business Logic Layer
 * Builds the session from the backend and pushes status changes back to it
 */
export class TicketService {
  /** Tail of the update chain per ticket id */
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(
    private readonly repository: ITicketRepository,
    private readonly logger: LoggerLike
  ) {}

  /**
   * Fetch every ticket and build the initial session
   * Failures propagate: without tickets there is no session to show
   */
  async loadSession(): Promise<SessionState> {
    const tickets = await this.repository.fetchAll();
    this.logger.info(`Loaded ${tickets.length} ticket(s)`);
    return loadTickets(tickets);
  }

  /**
   * Persist a status change
   * Updates for the same ticket are sent one after another, in call order,
   * so the backend ends on the last status the operator picked.
   */
  updateStatus(id: string, status: TicketStatus): Promise<void> {
    const previous = this.inFlight.get(id) ?? Promise.resolve();
    const result = previous.then(() => this.repository.updateStatus(id, status));

    // The chain only orders requests; the caller gets the outcome through `result`
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.inFlight.set(id, tail);
    void tail.then(() => {
      if (this.inFlight.get(id) === tail) {
        this.inFlight.delete(id);
      }
    });

    return result;
  }

  /**
   * Wait until every queued update has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()]);
    }
  }
}
