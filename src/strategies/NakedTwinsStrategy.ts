import type { AssignmentTrace } from '../AssignmentTrace.ts';
import type { Board } from '../Board.ts';
import type { Unit } from '../topology.ts';
import type { Strategy } from './Strategy.ts';

import { assign } from '../assign.ts';
import { UNITS } from '../topology.ts';
import { ensureNonNullable } from '../typeGuards.ts';

const TWIN_SIZE = 2;

export interface NakedTwins {
  readonly cells: readonly [string, string];
  readonly digits: string;
  readonly unit: Unit;
}

export class NakedTwinsStrategy implements Strategy {
  public readonly name = 'naked-twins';

  public apply(board: Board, trace: AssignmentTrace): Board {
    const result = board.clone();
    for (const twins of findNakedTwins(board)) {
      for (const ref of twins.unit.cells) {
        if (twins.cells.includes(ref)) {
          continue;
        }
        const current = result.get(ref);
        const remaining = [...current].filter((digit) => !twins.digits.includes(digit)).join('');
        if (remaining === current) {
          continue;
        }
        // A single leftover digit is a commitment and must be traced
        if (remaining.length === 1) {
          assign(result, ref, remaining, trace);
        } else {
          result.set(ref, remaining);
        }
      }
    }
    return result;
  }
}

export function findNakedTwins(board: Board): NakedTwins[] {
  const found: NakedTwins[] = [];
  for (const unit of UNITS) {
    for (let i = 0; i < unit.cells.length; i++) {
      const first = ensureNonNullable(unit.cells[i]);
      const digits = board.get(first);
      if (digits.length !== TWIN_SIZE) {
        continue;
      }
      for (let j = i + 1; j < unit.cells.length; j++) {
        const second = ensureNonNullable(unit.cells[j]);
        if (board.get(second) === digits) {
          found.push({ cells: [first, second], digits, unit });
        }
      }
    }
  }
  return found;
}
