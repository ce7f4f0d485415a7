import { TicketStatus } from '../entities/Ticket.js';

/**
 * Order in which the `e` key walks a ticket through its statuses
 */
export const STATUS_CYCLE: readonly TicketStatus[] = [
  TicketStatus.OPEN,
  TicketStatus.IN_PROGRESS,
  TicketStatus.CLOSED,
  TicketStatus.UNPLANNED
];

/**
 * Next status in the cycle. Open → InProgress → Closed → Unplanned → Open.
 */
export function nextStatus(status: TicketStatus): TicketStatus {
  switch (status) {
    case TicketStatus.OPEN:
      return TicketStatus.IN_PROGRESS;
    case TicketStatus.IN_PROGRESS:
      return TicketStatus.CLOSED;
    case TicketStatus.CLOSED:
      return TicketStatus.UNPLANNED;
    case TicketStatus.UNPLANNED:
      return TicketStatus.OPEN;
  }
}

/**
 * Map a wire status string onto the enum (exact, case-sensitive match)
 */
export function parseTicketStatus(value: string): TicketStatus | undefined {
  return STATUS_CYCLE.find(status => status === value);
}
