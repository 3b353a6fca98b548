import type { AssignmentTrace } from '../AssignmentTrace.ts';
import type { Board } from '../Board.ts';

export interface Strategy {
  apply(board: Board, trace: AssignmentTrace): Board;
  readonly name: string;
}
