import { Board } from './Board.ts';
import {
  ALL_DIGITS,
  CELL_REFS,
  GRID_SIZE
} from './topology.ts';
import { isDigit } from './typeGuards.ts';

const CELL_COUNT = GRID_SIZE * GRID_SIZE;
const UNKNOWN_PLACEHOLDER = '.';

export function formatGrid(board: Board): string {
  return CELL_REFS.map((ref) => {
    const digits = board.get(ref);
    return digits.length === 1 ? digits : UNKNOWN_PLACEHOLDER;
  }).join('');
}

export function parseGrid(grid: string): Board {
  // Whitespace is ignored so grids can be written one row per line
  const compact = grid.replace(/\s+/g, '');
  if (compact.length !== CELL_COUNT) {
    throw new Error(`Grid must have ${String(CELL_COUNT)} cells, got ${String(compact.length)}`);
  }

  return new Board(CELL_REFS.map((ref, index) => {
    const ch = compact.charAt(index);
    if (ch === UNKNOWN_PLACEHOLDER) {
      return [ref, ALL_DIGITS] as const;
    }
    if (!isDigit(ch)) {
      throw new Error(`Invalid character '${ch}' at ${ref}: expected '.' or a digit 1-9`);
    }
    return [ref, ch] as const;
  }));
}
