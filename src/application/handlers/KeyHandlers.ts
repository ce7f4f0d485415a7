import type { Key } from 'ink';

import type { SessionCommand } from '../SessionController.js';

export type KeyCommand = SessionCommand | { readonly type: 'quit' };

export type KeyState = Pick<Key, 'upArrow' | 'downArrow' | 'pageUp' | 'pageDown' | 'ctrl'>;

/**
 * Key Handlers
 * Translates a key press into a session command; unbound keys give null
 */
export function resolveKeyCommand(input: string, key: KeyState): KeyCommand | null {
  if (input === 'q' || (key.ctrl && input === 'c')) {
    return { type: 'quit' };
  }
  if (key.upArrow) {
    return { type: 'move', delta: -1 };
  }
  if (key.downArrow) {
    return { type: 'move', delta: 1 };
  }
  if (key.pageUp) {
    return { type: 'scroll', delta: -1 };
  }
  if (key.pageDown) {
    return { type: 'scroll', delta: 1 };
  }
  if (input === 'e' && !key.ctrl) {
    return { type: 'cycleStatus' };
  }
  return null;
}

/**
 * Footer hints, in display order
 */
export const KEY_HINTS: readonly string[] = [
  '↑/↓: Navigate',
  'E: Change Status',
  'PgUp/PgDn: Scroll',
  'Q: Quit'
];
