import { Box, Text } from 'ink';

import type { Ticket } from '../../core/entities/Ticket.js';
import { scrollIndicator, visibleWindow, wrapText } from '../format.js';
import { colors } from '../theme.js';

export const DESCRIPTION_PLACEHOLDER = 'Select a ticket to view its description';

export interface DescriptionPaneProps {
  readonly ticket: Ticket | undefined;
  readonly scrollOffset: number;
  readonly width: number;
  readonly height: number;
}

export function DescriptionPane({ ticket, scrollOffset, width, height }: DescriptionPaneProps) {
  // Border and horizontal padding take two columns per side; border and title three rows
  const textWidth = Math.max(1, width - 4);
  const textHeight = Math.max(1, height - 3);

  const lines = ticket ? wrapText(ticket.description, textWidth) : [DESCRIPTION_PLACEHOLDER];
  const view = visibleWindow(lines, ticket ? scrollOffset : 0, textHeight);
  const indicator = ticket ? scrollIndicator(scrollOffset, view.total, textHeight) : '';

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={colors.border} paddingX={1} width={width} height={height}>
      <Box justifyContent="space-between">
        <Text bold color={colors.muted}>Description</Text>
        {indicator ? <Text color={colors.muted}>{indicator}</Text> : null}
      </Box>
      {view.lines.map((line, index) => (
        <Text key={index} color={ticket ? colors.text : colors.muted}>
          {line}
        </Text>
      ))}
    </Box>
  );
}
