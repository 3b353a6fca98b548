import type { AssignmentTrace } from './AssignmentTrace.ts';
import type { Board } from './Board.ts';

export function assign(board: Board, ref: string, digits: string, trace: AssignmentTrace): Board {
  board.set(ref, digits);
  if (digits.length === 1) {
    trace.record(board);
  }
  return board;
}
