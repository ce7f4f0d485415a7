import { Text } from 'ink';

import type { SessionSnapshot } from '../../application/SessionController.js';
import { colors } from '../theme.js';

export type StatusLineProps = Pick<SessionSnapshot, 'notice' | 'pendingUpdates'>;

export function StatusLine({ notice, pendingUpdates }: StatusLineProps) {
  if (notice) {
    return (
      <Text wrap="truncate" color={notice.level === 'error' ? colors.error : colors.muted}>
        {notice.message}
      </Text>
    );
  }
  if (pendingUpdates > 0) {
    return <Text color={colors.muted}>Saving {pendingUpdates} status update{pendingUpdates === 1 ? '' : 's'}…</Text>;
  }
  return <Text> </Text>;
}
