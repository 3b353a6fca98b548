/**
 * Solve a diagonal Sudoku from a YAML puzzle file or an inline 81-character grid.
 *
 * Usage:
 *     npm run solveSudoku -- puzzles/diagonal.yaml
 *     npm run solveSudoku -- '2.............62....1....7...6..8...3...9...7...6..4...4....8....52.............3' --trace
 *
 * Options:
 *     --trace               Replay every single-value assignment after solving
 *     --refinement <name>   Refinement applied after propagation (naked-twins, none)
 */

/* eslint-disable no-console -- CLI script output. */

import type { PuzzleSpec } from '../src/puzzleSpec.ts';

import {
  existsSync,
  readFileSync
} from 'node:fs';
import {
  basename,
  extname
} from 'node:path';

import {
  formatBoard,
  replayTrace,
  TextRenderer
} from '../src/display.ts';
import { parseGrid } from '../src/parsers.ts';
import { parsePuzzleSpec } from '../src/puzzleSpec.ts';
import { findUnitViolations } from '../src/solutionChecks.ts';
import { Solver } from '../src/Solver.ts';
import {
  createRefinement,
  DEFAULT_REFINEMENT,
  isRefinementName,
  REFINEMENT_NAMES
} from '../src/strategies/createDefaultStrategies.ts';

const FIRST_CLI_ARG_INDEX = 2;

interface CliOptions {
  readonly input: string;
  readonly refinement?: string;
  readonly showTrace: boolean;
}

function loadPuzzle(input: string): PuzzleSpec {
  if (existsSync(input)) {
    return parsePuzzleSpec(readFileSync(input, 'utf-8'), basename(input, extname(input)));
  }
  return { grid: input, refinement: DEFAULT_REFINEMENT, title: 'Inline grid' };
}

function main(): void {
  const options = parseArgs(process.argv.slice(FIRST_CLI_ARG_INDEX));
  const spec = loadPuzzle(options.input);
  const refinementName = options.refinement ?? spec.refinement;
  if (!isRefinementName(refinementName)) {
    throw new Error(`Unknown refinement '${refinementName}', expected one of: ${REFINEMENT_NAMES.join(', ')}`);
  }

  const initial = parseGrid(spec.grid);
  console.log(spec.title);
  console.log(formatBoard(initial));
  console.log('');

  const solver = new Solver({ refinement: createRefinement(refinementName) });
  const result = solver.search(initial);
  const { contradictions, guesses, maxDepth, nodes } = solver.stats;
  const statsLine = `Nodes: ${String(nodes)}, guesses: ${String(guesses)}, contradictions: ${String(contradictions)}, `
    + `max depth: ${String(maxDepth)}, assignments: ${String(solver.trace.length)}`;

  if (options.showTrace) {
    replayTrace(solver.trace, new TextRenderer((text) => {
      console.log(text);
      console.log('');
    }));
  }

  if (!result) {
    console.error('No solution: the puzzle is contradictory.');
    console.error(statsLine);
    process.exit(1);
  }

  if (!result.isSolved) {
    console.error('No solution: every branch was exhausted. Last reduced board:');
    console.error(formatBoard(result));
    console.error(statsLine);
    process.exit(1);
  }

  const violations = findUnitViolations(result);
  if (violations.length > 0) {
    console.error(`Solver returned an invalid board, violated units: ${violations.map(String).join(', ')}`);
    process.exit(1);
  }

  console.log(formatBoard(result));
  console.log('');
  console.log(statsLine);
}

function parseArgs(args: readonly string[]): CliOptions {
  let input: string | undefined;
  let refinement: string | undefined;
  let showTrace = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--trace') {
      showTrace = true;
    } else if (arg === '--refinement') {
      i++;
      refinement = args[i];
      if (refinement === undefined) {
        throw new Error('--refinement expects a value');
      }
    } else if (arg !== undefined && input === undefined) {
      input = arg;
    } else {
      throw new Error(`Unexpected argument: ${String(arg)}`);
    }
  }

  if (input === undefined) {
    console.error('Usage: npm run solveSudoku -- <puzzle.yaml | grid> [--trace] [--refinement <name>]');
    process.exit(1);
  }

  return {
    input,
    showTrace,
    ...refinement !== undefined && { refinement }
  };
}

try {
  main();
} catch (error: unknown) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

/* eslint-enable no-console -- End CLI script output. */
