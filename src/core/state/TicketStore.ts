import type { Ticket, TicketStatus } from '../entities/Ticket.js';
import { orderTickets } from '../policies/OrderingPolicy.js';
import { reselectAfterMutation } from './SelectionTracker.js';
import type { SessionState } from './SessionState.js';

/**
 * Build a fresh session from a full fetch: ordered, first ticket selected, scroll at the top
 */
export function loadTickets(tickets: readonly Ticket[]): SessionState {
  const ordered = orderTickets(tickets);
  return {
    tickets: ordered,
    selectedId: ordered[0]?.id ?? null,
    scrollOffset: 0
  };
}

export function findTicket(state: SessionState, id: string): Ticket | undefined {
  return state.tickets.find(ticket => ticket.id === id);
}

export function selectedTicket(state: SessionState): Ticket | undefined {
  return state.selectedId === null ? undefined : findTicket(state, state.selectedId);
}

/**
 * Set a ticket's status and re-order the collection.
 * The selected ticket stays selected wherever it lands; unknown ids are a no-op.
 */
export function applyStatusChange(
  state: SessionState,
  id: string,
  status: TicketStatus
): SessionState {
  const current = findTicket(state, id);
  if (!current) {
    return state;
  }

  const updated = state.tickets.map(ticket =>
    ticket.id === id ? { ...ticket, status } : ticket
  );
  const next: SessionState = { ...state, tickets: orderTickets(updated) };

  return state.selectedId === null ? next : reselectAfterMutation(next, state.selectedId);
}
