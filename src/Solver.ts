import type { Board } from './Board.ts';
import type { Strategy } from './strategies/Strategy.ts';

import { assign } from './assign.ts';
import { AssignmentTrace } from './AssignmentTrace.ts';
import { parseGrid } from './parsers.ts';
import {
  createPropagationStrategies,
  createRefinement
} from './strategies/createDefaultStrategies.ts';
import { ensureNonNullable } from './typeGuards.ts';

export interface SolverOptions {
  readonly propagation?: readonly Strategy[];
  readonly refinement?: Strategy;
  readonly trace?: AssignmentTrace;
}

export interface SolveStats {
  readonly contradictions: number;
  readonly guesses: number;
  readonly maxDepth: number;
  readonly nodes: number;
}

interface MutableSolveStats {
  contradictions: number;
  guesses: number;
  maxDepth: number;
  nodes: number;
}

/**
 * Depth-first search over candidate boards, propagating to a fixed point before every guess.
 *
 * Each branch works on its own copy of the board; only the trace is shared across the search tree.
 * A returned board is not necessarily solved: when every guess on the branching cell fails, the
 * branch hands back its reduced board. Check `isSolved` on the result.
 */
export class Solver {
  public get stats(): SolveStats {
    return { ...this._stats };
  }

  public readonly trace: AssignmentTrace;
  private readonly _stats: MutableSolveStats = {
    contradictions: 0,
    guesses: 0,
    maxDepth: 0,
    nodes: 0
  };

  private readonly propagation: readonly Strategy[];
  private readonly refinement: Strategy;

  public constructor(options: SolverOptions = {}) {
    this.propagation = options.propagation ?? createPropagationStrategies();
    this.refinement = options.refinement ?? createRefinement();
    this.trace = options.trace ?? new AssignmentTrace();
  }

  public reduce(board: Board): Board | null {
    let current = board;
    let stalled = false;
    while (!stalled) {
      const solvedBefore = current.solvedCount;
      for (const strategy of this.propagation) {
        current = strategy.apply(current, this.trace);
      }
      if (current.isContradictory) {
        this._stats.contradictions++;
        return null;
      }
      stalled = current.solvedCount === solvedBefore;
    }
    return current;
  }

  public search(board: Board): Board | null {
    return this.searchAt(board, 0);
  }

  public solve(grid: string): Board | null {
    return this.search(parseGrid(grid));
  }

  private searchAt(board: Board, depth: number): Board | null {
    this._stats.nodes++;
    this._stats.maxDepth = Math.max(this._stats.maxDepth, depth);

    const reduced = this.reduce(board);
    if (!reduced) {
      return null;
    }

    const refined = this.refinement.apply(reduced, this.trace);
    if (refined.isContradictory) {
      this._stats.contradictions++;
      return null;
    }
    if (refined.isSolved) {
      return refined;
    }

    const branchCell = ensureNonNullable(findBestCell(refined), 'Unsolved board has no undetermined cell');
    for (const digit of refined.get(branchCell)) {
      this._stats.guesses++;
      const attempt = assign(refined.clone(), branchCell, digit, this.trace);
      const result = this.searchAt(attempt, depth + 1);
      if (result?.isSolved) {
        return result;
      }
    }

    return refined;
  }
}

// Ties go to the first cell in row-major order
export function findBestCell(board: Board): null | string {
  let bestRef: null | string = null;
  let bestCount = Infinity;
  for (const [ref, digits] of board.entries()) {
    if (digits.length > 1 && digits.length < bestCount) {
      bestRef = ref;
      bestCount = digits.length;
    }
  }
  return bestRef;
}

export function solve(grid: string, options: SolverOptions = {}): Board | null {
  return new Solver(options).solve(grid);
}
