import type {
  Board,
  BoardSnapshot
} from './Board.ts';

export class AssignmentTrace {
  public get length(): number {
    return this._snapshots.length;
  }

  public get snapshots(): readonly BoardSnapshot[] {
    return this._snapshots;
  }

  private readonly _snapshots: BoardSnapshot[] = [];

  public at(index: number): BoardSnapshot | undefined {
    return this._snapshots[index];
  }

  public last(): BoardSnapshot | undefined {
    return this._snapshots[this._snapshots.length - 1];
  }

  public record(board: Board): void {
    this._snapshots.push(board.toRecord());
  }
}
