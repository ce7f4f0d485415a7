import type { Ticket } from '../entities/Ticket.js';

/**
 * Everything the renderer needs to draw a frame.
 * Operations never mutate a state value; they return the next one
 * (or the same object when nothing changed).
 */
export interface SessionState {
  /** Always ordered by the ordering policy */
  readonly tickets: readonly Ticket[];
  /** Id of a ticket in `tickets`; null only when `tickets` is empty */
  readonly selectedId: string | null;
  /** Lines scrolled into the selected ticket's description */
  readonly scrollOffset: number;
}

/** One step up (-1) or down (+1) */
export type Step = -1 | 1;
