import { render } from 'ink-testing-library';
import { describe, it, expect } from 'vitest';

import { SessionController } from '../../src/application/SessionController.js';
import { TicketStatus } from '../../src/core/entities/Ticket.js';
import { TicketService } from '../../src/core/services/TicketService.js';
import { loadTickets } from '../../src/core/state/TicketStore.js';
import { App } from '../../src/ui/App.js';
import { DESCRIPTION_PLACEHOLDER, DescriptionPane } from '../../src/ui/components/DescriptionPane.js';
import { StatusLine } from '../../src/ui/components/StatusLine.js';
import { TicketTable } from '../../src/ui/components/TicketTable.js';
import { FakeTicketRepository, createLogger } from '../helpers/fakes.js';
import { makeTicket } from '../helpers/tickets.js';

const session = () =>
  loadTickets([
    makeTicket('A', TicketStatus.OPEN, '2024-01-01'),
    makeTicket('B', TicketStatus.IN_PROGRESS, '2024-01-05'),
    makeTicket('C', TicketStatus.UNPLANNED, '2024-06-01')
  ]);

function frameOf(output: string | undefined): string {
  if (output === undefined) {
    throw new Error('Nothing rendered');
  }
  return output;
}

describe('TicketTable', () => {
  it('lists tickets in session order and marks the selected row', () => {
    const { tickets, selectedId } = session();
    const { lastFrame } = render(<TicketTable tickets={tickets} selectedId={selectedId} width={84} height={12} />);
    const frame = frameOf(lastFrame());

    expect(frame).toContain('Tickets (3)');
    expect(frame).toContain('▶ First-B');
    expect(frame.indexOf('First-B')).toBeLessThan(frame.indexOf('First-A'));
    expect(frame.indexOf('First-A')).toBeLessThan(frame.indexOf('First-C'));
    expect(frame).toContain('01-05-2024');
    expect(frame).toContain('InProgress');
    expect(frame).toContain('E: Change Status');
  });

  it('draws priority and department values named like Object.prototype members', () => {
    const tickets = [makeTicket('A', TicketStatus.OPEN, '2024-01-01', { priority: 'constructor', department: 'toString' })];
    const { lastFrame } = render(<TicketTable tickets={tickets} selectedId="A" width={84} height={12} />);
    const frame = frameOf(lastFrame());

    expect(frame).toContain('constructor');
    expect(frame).toContain('toString');
  });

  it('says so when there are no tickets', () => {
    const { lastFrame } = render(<TicketTable tickets={[]} selectedId={null} width={84} height={8} />);
    expect(frameOf(lastFrame())).toContain('No tickets submitted');
  });
});

describe('DescriptionPane', () => {
  it('shows a placeholder without a selected ticket', () => {
    const { lastFrame } = render(<DescriptionPane ticket={undefined} scrollOffset={0} width={60} height={6} />);
    expect(frameOf(lastFrame())).toContain(DESCRIPTION_PLACEHOLDER);
  });

  it('starts the text at the scroll offset', () => {
    const ticket = makeTicket('A', TicketStatus.OPEN, '2024-01-01', {
      description: 'line one\nline two\nline three'
    });
    const { lastFrame } = render(<DescriptionPane ticket={ticket} scrollOffset={1} width={60} height={10} />);
    const frame = frameOf(lastFrame());

    expect(frame).not.toContain('line one');
    expect(frame).toContain('line two');
    expect(frame).toContain('line three');
    expect(frame).toContain('2/3');
  });
});

describe('StatusLine', () => {
  it('prefers the notice over the pending count', () => {
    const { lastFrame } = render(
      <StatusLine notice={{ level: 'error', message: 'Failed to update status of ticket A - offline' }} pendingUpdates={2} />
    );
    expect(frameOf(lastFrame())).toContain('Failed to update status of ticket A - offline');
  });

  it('shows how many updates are in flight', () => {
    const { lastFrame } = render(<StatusLine notice={null} pendingUpdates={2} />);
    expect(frameOf(lastFrame())).toContain('Saving 2 status updates…');
  });
});

describe('App', () => {
  it('draws the table and the selected ticket description', () => {
    const logger = createLogger();
    const controller = new SessionController(new TicketService(new FakeTicketRepository(), logger), session(), { logger });
    const { lastFrame, unmount } = render(<App controller={controller} />);
    const frame = frameOf(lastFrame());

    expect(frame).toContain('▶ First-B');
    expect(frame).toContain('Description of B');
    unmount();
  });
});
