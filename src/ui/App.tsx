import { Box, useApp, useInput, useStdout } from 'ink';
import { useSyncExternalStore } from 'react';

import { resolveKeyCommand } from '../application/handlers/KeyHandlers.js';
import type { SessionController } from '../application/SessionController.js';
import { TABLE_HEIGHT_RATIO } from '../constants.js';
import { selectedTicket } from '../core/state/TicketStore.js';
import { DescriptionPane } from './components/DescriptionPane.js';
import { StatusLine } from './components/StatusLine.js';
import { TicketTable } from './components/TicketTable.js';

export interface AppProps {
  readonly controller: SessionController;
}

export function App({ controller }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const snapshot = useSyncExternalStore(controller.subscribe, controller.getSnapshot);

  useInput((input, key) => {
    const command = resolveKeyCommand(input, key);
    if (!command) {
      return;
    }
    if (command.type === 'quit') {
      exit();
      return;
    }
    // Settles on its own; failures end up in the snapshot notice
    void controller.dispatch(command);
  });

  const width = stdout.columns ?? 80;
  // One row for the status line, one spare so Ink never scrolls the terminal
  const available = Math.max(8, (stdout.rows ?? 24) - 2);
  const tableHeight = Math.floor(available * TABLE_HEIGHT_RATIO);
  const { session } = snapshot;

  return (
    <Box flexDirection="column" width={width}>
      <TicketTable tickets={session.tickets} selectedId={session.selectedId} width={width} height={tableHeight} />
      <DescriptionPane
        ticket={selectedTicket(session)}
        scrollOffset={session.scrollOffset}
        width={width}
        height={available - tableHeight}
      />
      <StatusLine notice={snapshot.notice} pendingUpdates={snapshot.pendingUpdates} />
    </Box>
  );
}
