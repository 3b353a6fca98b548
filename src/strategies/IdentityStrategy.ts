import type { Board } from '../Board.ts';
import type { Strategy } from './Strategy.ts';

export class IdentityStrategy implements Strategy {
  public readonly name = 'none';

  public apply(board: Board): Board {
    return board.clone();
  }
}
