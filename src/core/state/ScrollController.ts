import type { SessionState, Step } from './SessionState.js';

/**
 * Scroll the description pane by one line, never above the first line.
 * There is no upper bound tied to the description length.
 */
export function scrollDescription(state: SessionState, delta: Step): SessionState {
  const scrollOffset = Math.max(0, state.scrollOffset + delta);
  if (scrollOffset === state.scrollOffset) {
    return state;
  }
  return { ...state, scrollOffset };
}

export function resetScroll(state: SessionState): SessionState {
  return state.scrollOffset === 0 ? state : { ...state, scrollOffset: 0 };
}
