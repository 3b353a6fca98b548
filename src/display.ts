import type { AssignmentTrace } from './AssignmentTrace.ts';

import { Board } from './Board.ts';
import {
  COLUMN_LABELS,
  ROW_LABELS
} from './topology.ts';

export interface BoardRenderer {
  renderAssignment(snapshot: Board, step: number, total: number): void;
  renderBoard(board: Board): void;
}

const BOX_SIZE = 3;
const CELL_PADDING = 1;

export function formatBoard(board: Board): string {
  let widest = 0;
  for (const [, digits] of board.entries()) {
    widest = Math.max(widest, digits.length);
  }
  const width = widest + CELL_PADDING;
  const separator = Array.from({ length: BOX_SIZE }, () => '-'.repeat(width * BOX_SIZE)).join('+');

  const lines: string[] = [];
  for (const [rowIndex, row] of [...ROW_LABELS].entries()) {
    const cells = [...COLUMN_LABELS].map((column, columnIndex) => {
      const text = center(board.get(row + column), width);
      const endsBox = (columnIndex + 1) % BOX_SIZE === 0 && columnIndex + 1 < COLUMN_LABELS.length;
      return endsBox ? `${text}|` : text;
    });
    lines.push(cells.join('').trimEnd());
    const endsBand = (rowIndex + 1) % BOX_SIZE === 0 && rowIndex + 1 < ROW_LABELS.length;
    if (endsBand) {
      lines.push(separator);
    }
  }
  return lines.join('\n');
}

export function replayTrace(trace: AssignmentTrace, renderer: BoardRenderer): void {
  const total = trace.length;
  trace.snapshots.forEach((snapshot, index) => {
    renderer.renderAssignment(Board.fromRecord(snapshot), index + 1, total);
  });
}

export class TextRenderer implements BoardRenderer {
  public constructor(private readonly write: (text: string) => void) {
  }

  public renderAssignment(snapshot: Board, step: number, total: number): void {
    this.write(`Assignment ${String(step)} of ${String(total)}`);
    this.write(formatBoard(snapshot));
  }

  public renderBoard(board: Board): void {
    this.write(formatBoard(board));
  }
}

function center(text: string, width: number): string {
  const padding = Math.max(0, width - text.length);
  const left = Math.floor(padding / 2);
  return ' '.repeat(left) + text + ' '.repeat(padding - left);
}
