import { Box, Text } from 'ink';

import { KEY_HINTS } from '../../application/handlers/KeyHandlers.js';
import type { Ticket } from '../../core/entities/Ticket.js';
import { formatDisplayDate } from '../../utils/dates.js';
import { firstVisibleRow } from '../format.js';
import { colors, departmentColor, priorityColor, statusColor } from '../theme.js';

const COLUMNS = ['Submitter', 'Date', 'Location', 'Exhibit', 'Priority', 'Department', 'Status'] as const;

// Border, title, header and footer rows
const CHROME_ROWS = 5;

export interface TicketTableProps {
  readonly tickets: readonly Ticket[];
  readonly selectedId: string | null;
  readonly width: number;
  readonly height: number;
}

interface CellProps {
  readonly width: number;
  readonly value: string;
  readonly color?: string;
  readonly backgroundColor?: string;
  readonly bold?: boolean;
}

function Cell({ width, value, color, backgroundColor, bold }: CellProps) {
  return (
    <Box width={width}>
      <Text wrap="truncate" color={color} backgroundColor={backgroundColor} bold={bold}>
        {value}
      </Text>
    </Box>
  );
}

interface TicketRowProps {
  readonly ticket: Ticket;
  readonly selected: boolean;
  readonly columnWidth: number;
}

function TicketRow({ ticket, selected, columnWidth }: TicketRowProps) {
  const background = selected ? colors.selectedBackground : colors.rowBackground;
  const marker = selected ? '▶ ' : '  ';

  return (
    <Box>
      <Cell width={columnWidth} value={marker + ticket.submitter.first} color={colors.text} backgroundColor={background} bold={selected} />
      <Cell width={columnWidth} value={formatDisplayDate(ticket.submittedAt.date)} color={colors.text} backgroundColor={background} />
      <Cell width={columnWidth} value={ticket.location} color={colors.text} backgroundColor={background} />
      <Cell width={columnWidth} value={ticket.exhibitName} color={colors.text} backgroundColor={background} />
      <Cell width={columnWidth} value={ticket.priority} color={priorityColor(ticket.priority)} backgroundColor={background} />
      <Cell width={columnWidth} value={ticket.department} color={departmentColor(ticket.department)} backgroundColor={background} />
      <Cell width={columnWidth} value={ticket.status} color={statusColor(ticket.status)} backgroundColor={background} />
    </Box>
  );
}

/**
 * Ticket list, one row per ticket, scrolled so the selected row is visible
 */
export function TicketTable({ tickets, selectedId, width, height }: TicketTableProps) {
  const columnWidth = Math.max(4, Math.floor((width - 2) / COLUMNS.length));
  const visibleRows = Math.max(1, height - CHROME_ROWS);
  const selectedIndex = tickets.findIndex(ticket => ticket.id === selectedId);
  const start = firstVisibleRow(Math.max(0, selectedIndex), tickets.length, visibleRows);
  const rows = tickets.slice(start, start + visibleRows);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={colors.border} width={width} height={height}>
      <Text bold color={colors.muted}>Tickets ({tickets.length})</Text>
      <Box>
        {COLUMNS.map(column => (
          <Cell key={column} width={columnWidth} value={column} color={colors.text} backgroundColor={colors.headerBackground} bold />
        ))}
      </Box>
      <Box flexDirection="column" flexGrow={1}>
        {rows.length === 0 ? (
          <Text color={colors.muted}>No tickets submitted</Text>
        ) : (
          rows.map(ticket => (
            <TicketRow key={ticket.id} ticket={ticket} selected={ticket.id === selectedId} columnWidth={columnWidth} />
          ))
        )}
      </Box>
      <Text wrap="truncate" bold color={colors.text} backgroundColor={colors.headerBackground}>
        {KEY_HINTS.join('   ')}
      </Text>
    </Box>
  );
}
