import { CELL_REFS } from './topology.ts';
import { ensureNonNullable } from './typeGuards.ts';

export type BoardSnapshot = Readonly<Record<string, string>>;

export class Board {
  public get isContradictory(): boolean {
    for (const digits of this.candidates.values()) {
      if (digits.length === 0) {
        return true;
      }
    }
    return false;
  }

  public get isSolved(): boolean {
    for (const digits of this.candidates.values()) {
      if (digits.length !== 1) {
        return false;
      }
    }
    return true;
  }

  public get refs(): readonly string[] {
    return CELL_REFS;
  }

  public get solvedCount(): number {
    let count = 0;
    for (const digits of this.candidates.values()) {
      if (digits.length === 1) {
        count++;
      }
    }
    return count;
  }

  private readonly candidates: Map<string, string>;

  public constructor(initial: Iterable<readonly [string, string]>) {
    const given = new Map(initial);
    this.candidates = new Map<string, string>();
    for (const ref of CELL_REFS) {
      this.candidates.set(ref, ensureNonNullable(given.get(ref), `Missing candidates for cell ${ref}`));
      given.delete(ref);
    }
    if (given.size > 0) {
      throw new Error(`Unknown cell: ${[...given.keys()].join(', ')}`);
    }
  }

  public static fromRecord(record: BoardSnapshot): Board {
    return new Board(Object.entries(record));
  }

  public clone(): Board {
    return new Board(this.candidates);
  }

  public entries(): Iterable<readonly [string, string]> {
    return this.candidates.entries();
  }

  public equals(other: Board): boolean {
    for (const [ref, digits] of this.candidates) {
      if (other.get(ref) !== digits) {
        return false;
      }
    }
    return true;
  }

  public get(ref: string): string {
    return ensureNonNullable(this.candidates.get(ref), `Unknown cell: ${ref}`);
  }

  // Single-value commits go through `assign` so they reach the trace
  public set(ref: string, digits: string): void {
    if (!this.candidates.has(ref)) {
      throw new Error(`Unknown cell: ${ref}`);
    }
    this.candidates.set(ref, digits);
  }

  public toRecord(): BoardSnapshot {
    return Object.freeze(Object.fromEntries(this.candidates));
  }
}
