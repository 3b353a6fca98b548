import {
  describe,
  expect,
  it
} from 'vitest';

import { AssignmentTrace } from '../src/AssignmentTrace.ts';
import {
  formatBoard,
  replayTrace,
  TextRenderer
} from '../src/display.ts';
import { parseGrid } from '../src/parsers.ts';
import {
  createBoard,
  DIAGONAL_EXAMPLE_SOLUTION,
  RecordingRenderer
} from './boardTestHelper.ts';

describe('formatBoard', () => {
  it('renders a solved board with box separators', () => {
    const lines = formatBoard(parseGrid(DIAGONAL_EXAMPLE_SOLUTION)).split('\n');

    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe('2 6 7 |9 4 5 |3 8 1');
    expect(lines[3]).toBe('------+------+------');
    expect(lines[10]).toBe('7 1 8 |5 6 4 |9 2 3');
  });

  it('widens cells to fit the longest candidate set', () => {
    const lines = formatBoard(createBoard({ A1: '5' }, '12')).split('\n');

    expect(lines[0]).toBe(' 5 12 12 |12 12 12 |12 12 12');
    expect(lines[3]).toBe('---------+---------+---------');
  });
});

describe('replayTrace', () => {
  it('feeds every snapshot to the renderer in order', () => {
    const trace = new AssignmentTrace();
    const board = createBoard();
    board.set('A1', '1');
    trace.record(board);
    board.set('A2', '2');
    trace.record(board);

    const renderer = new RecordingRenderer();
    replayTrace(trace, renderer);
    expect(renderer.assignments).toEqual(['1/2:1', '2/2:2']);
  });
});

describe('TextRenderer', () => {
  it('writes a heading before each assignment frame', () => {
    const output: string[] = [];
    const renderer = new TextRenderer((text) => {
      output.push(text);
    });
    const board = parseGrid(DIAGONAL_EXAMPLE_SOLUTION);

    renderer.renderAssignment(board, 3, 64);
    renderer.renderBoard(board);

    expect(output).toHaveLength(3);
    expect(output[0]).toBe('Assignment 3 of 64');
    expect(output[1]).toBe(formatBoard(board));
    expect(output[2]).toBe(output[1]);
  });
});
