import { resetScroll } from './ScrollController.js';
import type { SessionState, Step } from './SessionState.js';

function indexOfSelected(state: SessionState): number {
  return state.tickets.findIndex(ticket => ticket.id === state.selectedId);
}

/**
 * Move the selection to the visually adjacent ticket.
 * No wraparound: moving past either end returns the state unchanged.
 * A successful move resets the description scroll.
 */
export function moveSelection(state: SessionState, delta: Step): SessionState {
  const index = indexOfSelected(state);
  if (index === -1) {
    return state;
  }

  const target = state.tickets[index + delta];
  if (target === undefined) {
    return state;
  }

  return resetScroll({ ...state, selectedId: target.id });
}

/**
 * Re-anchor the selection to `id` after the collection was re-ordered.
 * Position is irrelevant, only identity; the scroll offset is left alone.
 *
 * If `id` is gone the current selection is kept when still valid, otherwise
 * the first ticket is selected so the selection never dangles.
 */
export function reselectAfterMutation(state: SessionState, id: string): SessionState {
  const candidates = [id, state.selectedId];
  for (const candidate of candidates) {
    if (candidate !== null && state.tickets.some(ticket => ticket.id === candidate)) {
      return candidate === state.selectedId ? state : { ...state, selectedId: candidate };
    }
  }

  const fallback = state.tickets[0]?.id ?? null;
  return fallback === state.selectedId ? state : { ...state, selectedId: fallback };
}
