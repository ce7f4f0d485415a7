import type { Ticket, TicketStatus } from '../entities/Ticket.js';

/**
 * Repository Interface for the ticket backend
 * Infrastructure layer will implement this
 */
export interface ITicketRepository {
  /**
   * Fetch every submitted ticket
   */
  fetchAll(): Promise<Ticket[]>;

  /**
   * Persist a status change for one ticket
   */
  updateStatus(id: string, status: TicketStatus): Promise<void>;
}
