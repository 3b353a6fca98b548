import type { AssignmentTrace } from '../AssignmentTrace.ts';
import type { Board } from '../Board.ts';
import type { Strategy } from './Strategy.ts';

import { assign } from '../assign.ts';
import { UNITS } from '../topology.ts';

export class OnlyChoiceStrategy implements Strategy {
  public readonly name = 'only-choice';

  public apply(board: Board, trace: AssignmentTrace): Board {
    const result = board.clone();
    for (const unit of UNITS) {
      // Tallies come from the input board, never from commitments made earlier in this pass.
      const cellsByDigit = new Map<string, string[]>();
      for (const ref of unit.cells) {
        for (const digit of board.get(ref)) {
          const cells = cellsByDigit.get(digit);
          if (cells) {
            cells.push(ref);
          } else {
            cellsByDigit.set(digit, [ref]);
          }
        }
      }

      for (const [digit, cells] of cellsByDigit) {
        const [onlyCell] = cells;
        if (cells.length === 1 && onlyCell !== undefined && result.get(onlyCell) !== digit) {
          assign(result, onlyCell, digit, trace);
        }
      }
    }
    return result;
  }
}
