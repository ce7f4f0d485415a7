import { describe, it, expect } from 'vitest';

import { TicketStatus } from '../../src/core/entities/Ticket.js';
import {
  applyStatusChange,
  findTicket,
  loadTickets,
  selectedTicket
} from '../../src/core/state/TicketStore.js';
import { moveSelection } from '../../src/core/state/SelectionTracker.js';
import { scrollDescription } from '../../src/core/state/ScrollController.js';
import { ids, makeTicket } from '../helpers/tickets.js';

const scenario = () => [
  makeTicket('A', TicketStatus.OPEN, '2024-01-01'),
  makeTicket('B', TicketStatus.IN_PROGRESS, '2024-01-05'),
  makeTicket('C', TicketStatus.UNPLANNED, '2024-06-01')
];

describe('loadTickets', () => {
  it('orders the tickets and selects the first one', () => {
    const state = loadTickets(scenario());
    expect(ids(state.tickets)).toEqual(['B', 'A', 'C']);
    expect(state.selectedId).toBe('B');
    expect(state.scrollOffset).toBe(0);
  });

  it('selects nothing when there are no tickets', () => {
    expect(loadTickets([])).toEqual({ tickets: [], selectedId: null, scrollOffset: 0 });
  });
});

describe('findTicket / selectedTicket', () => {
  it('looks tickets up by id', () => {
    const state = loadTickets(scenario());
    expect(findTicket(state, 'C')?.status).toBe(TicketStatus.UNPLANNED);
    expect(findTicket(state, 'missing')).toBeUndefined();
    expect(selectedTicket(state)?.id).toBe('B');
  });

  it('has no selected ticket in an empty session', () => {
    expect(selectedTicket(loadTickets([]))).toBeUndefined();
  });
});

describe('applyStatusChange', () => {
  it('keeps A selected and B ahead of it once both are InProgress', () => {
    const selectedA = moveSelection(loadTickets(scenario()), 1);
    expect(selectedA.selectedId).toBe('A');

    const state = applyStatusChange(selectedA, 'A', TicketStatus.IN_PROGRESS);
    expect(ids(state.tickets)).toEqual(['B', 'A', 'C']);
    expect(findTicket(state, 'A')?.status).toBe(TicketStatus.IN_PROGRESS);
    expect(state.selectedId).toBe('A');
  });

  it('follows the selected ticket to its new position', () => {
    const state = loadTickets(scenario());
    const moved = applyStatusChange(state, 'B', TicketStatus.CLOSED);
    expect(ids(moved.tickets)).toEqual(['B', 'A', 'C']);

    const unplanned = applyStatusChange(moved, 'B', TicketStatus.UNPLANNED);
    expect(ids(unplanned.tickets)).toEqual(['A', 'C', 'B']);
    expect(unplanned.selectedId).toBe('B');
  });

  it('keeps the selection on another ticket when a different one changes', () => {
    const state = loadTickets(scenario());
    const changed = applyStatusChange(state, 'C', TicketStatus.IN_PROGRESS);
    expect(ids(changed.tickets)).toEqual(['C', 'B', 'A']);
    expect(changed.selectedId).toBe('B');
  });

  it('leaves the scroll offset alone', () => {
    const scrolled = scrollDescription(scrollDescription(loadTickets(scenario()), 1), 1);
    const changed = applyStatusChange(scrolled, 'B', TicketStatus.CLOSED);
    expect(changed.scrollOffset).toBe(2);
  });

  it('is a no-op for unknown ids', () => {
    const state = loadTickets(scenario());
    expect(applyStatusChange(state, 'nope', TicketStatus.CLOSED)).toBe(state);
  });

  it('does not mutate the previous state', () => {
    const state = loadTickets(scenario());
    applyStatusChange(state, 'A', TicketStatus.UNPLANNED);
    expect(findTicket(state, 'A')?.status).toBe(TicketStatus.OPEN);
    expect(ids(state.tickets)).toEqual(['B', 'A', 'C']);
  });
});
