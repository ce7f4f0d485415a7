/**
 * Word-wrap text to `width` columns.
 * Explicit line breaks are kept, words longer than a line are split.
 */
export function wrapText(text: string, width: number): string[] {
  const columns = Math.max(1, Math.floor(width));
  const lines: string[] = [];

  for (const paragraph of text.split(/\r?\n/)) {
    let line = '';
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      // Code points, so astral characters are never split into lone surrogates
      let rest = Array.from(word);
      while (rest.length > columns) {
        if (line) {
          lines.push(line);
          line = '';
        }
        lines.push(rest.slice(0, columns).join(''));
        rest = rest.slice(columns);
      }
      if (rest.length === 0) {
        continue;
      }
      const chunk = rest.join('');
      if (!line) {
        line = chunk;
      } else if (Array.from(line).length + 1 + rest.length <= columns) {
        line += ` ${chunk}`;
      } else {
        lines.push(line);
        line = chunk;
      }
    }
    lines.push(line);
  }

  return lines;
}

export interface TextWindow {
  readonly lines: string[];
  readonly total: number;
}

/**
 * The `height` lines visible at `offset`. An offset past the end yields no lines.
 */
export function visibleWindow(lines: readonly string[], offset: number, height: number): TextWindow {
  return {
    lines: lines.slice(offset, offset + Math.max(0, height)),
    total: lines.length
  };
}

/**
 * Scroll position indicator shown in the description title, e.g. `↑ 3/12 ↓`
 */
export function scrollIndicator(offset: number, total: number, height: number): string {
  if (total <= height && offset === 0) {
    return '';
  }
  const up = offset > 0 ? '↑' : ' ';
  const down = offset + height < total ? '↓' : ' ';
  return `${up} ${Math.min(offset + 1, total)}/${total} ${down}`;
}

/**
 * First table row to draw so the selected row stays on screen
 */
export function firstVisibleRow(selectedIndex: number, rowCount: number, visibleRows: number): number {
  if (selectedIndex < visibleRows || rowCount <= visibleRows) {
    return 0;
  }
  return Math.min(selectedIndex - visibleRows + 1, rowCount - visibleRows);
}
