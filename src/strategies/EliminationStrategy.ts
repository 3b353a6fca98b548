import type { AssignmentTrace } from '../AssignmentTrace.ts';
import type { Board } from '../Board.ts';
import type { Strategy } from './Strategy.ts';

import { assign } from '../assign.ts';
import { peersOf } from '../topology.ts';

export class EliminationStrategy implements Strategy {
  public readonly name = 'elimination';

  public apply(board: Board, trace: AssignmentTrace): Board {
    const result = board.clone();
    for (const ref of result.refs) {
      const value = result.get(ref);
      if (value.length !== 1) {
        continue;
      }
      for (const peer of peersOf(ref)) {
        const peerDigits = result.get(peer);
        if (peerDigits.includes(value)) {
          assign(result, peer, peerDigits.replace(value, ''), trace);
        }
      }
    }
    return result;
  }
}
