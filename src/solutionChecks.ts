import type { Board } from './Board.ts';
import type { Unit } from './topology.ts';

import {
  ALL_DIGITS,
  UNITS
} from './topology.ts';

export function findUnitViolations(board: Board): Unit[] {
  return UNITS.filter((unit) => {
    const digits = unit.cells.map((ref) => board.get(ref)).sort((a, b) => a.localeCompare(b));
    return digits.join('') !== ALL_DIGITS;
  });
}

export function isValidSolution(board: Board): boolean {
  return board.isSolved && findUnitViolations(board).length === 0;
}
