import { type Ticket, TicketStatus } from '../entities/Ticket.js';
import { parseCalendarDate, toEpochDay } from '../../utils/dates.js';

/**
 * Sort key for tickets whose submission date cannot be parsed.
 * Places them after every dated ticket of the same status bucket.
 */
const UNDATED = Number.NEGATIVE_INFINITY;

/**
 * Status bucket: InProgress first, Open and Closed together, Unplanned last
 */
export function statusBucket(status: TicketStatus): number {
  switch (status) {
    case TicketStatus.IN_PROGRESS:
      return 0;
    case TicketStatus.OPEN:
    case TicketStatus.CLOSED:
      return 1;
    case TicketStatus.UNPLANNED:
      return 2;
  }
}

function submissionKey(ticket: Ticket): number {
  const date = parseCalendarDate(ticket.submittedAt.date);
  return date ? toEpochDay(date) : UNDATED;
}

/**
 * Comparator for the ticket table: status bucket, then submission date newest first.
 * Tickets with equal keys compare as 0 so a stable sort keeps their relative order.
 */
export function compareTickets(a: Ticket, b: Ticket): number {
  const bucketOrder = statusBucket(a.status) - statusBucket(b.status);
  if (bucketOrder !== 0) {
    return bucketOrder;
  }

  const keyA = submissionKey(a);
  const keyB = submissionKey(b);
  if (keyA === keyB) {
    return 0;
  }
  return keyA > keyB ? -1 : 1;
}

/**
 * Return a new array ordered by {@link compareTickets}
 */
export function orderTickets(tickets: readonly Ticket[]): Ticket[] {
  return [...tickets].sort(compareTickets);
}
