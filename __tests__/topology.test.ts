import {
  describe,
  expect,
  it
} from 'vitest';

import {
  buildUnits,
  CELL_REFS,
  cross,
  peersOf,
  UNITS,
  unitsOf
} from '../src/topology.ts';

describe('cross', () => {
  it('concatenates every pair in order', () => {
    expect(cross('AB', '12')).toEqual(['A1', 'A2', 'B1', 'B2']);
  });
});

describe('buildUnits', () => {
  it('builds 29 units of 9 cells', () => {
    const units = buildUnits();
    expect(units).toHaveLength(29);
    for (const unit of units) {
      expect(unit.cells).toHaveLength(9);
      expect(new Set(unit.cells).size).toBe(9);
    }
  });

  it('orders rows, columns, boxes, then diagonals', () => {
    const types = buildUnits().map((unit) => unit.type);
    expect(types.slice(0, 9).every((type) => type === 'row')).toBe(true);
    expect(types.slice(9, 18).every((type) => type === 'column')).toBe(true);
    expect(types.slice(18, 27).every((type) => type === 'box')).toBe(true);
    expect(types.slice(27)).toEqual(['diagonal', 'diagonal']);
  });

  it('builds boxes band by band', () => {
    const boxes = UNITS.filter((unit) => unit.type === 'box');
    expect(boxes[0]?.cells).toEqual(['A1', 'A2', 'A3', 'B1', 'B2', 'B3', 'C1', 'C2', 'C3']);
    expect(boxes[5]?.cells).toEqual(['D7', 'D8', 'D9', 'E7', 'E8', 'E9', 'F7', 'F8', 'F9']);
  });

  it('builds both main diagonals', () => {
    const diagonals = UNITS.filter((unit) => unit.type === 'diagonal');
    expect(diagonals[0]?.cells).toEqual(['A1', 'B2', 'C3', 'D4', 'E5', 'F6', 'G7', 'H8', 'I9']);
    expect(diagonals[1]?.cells).toEqual(['I1', 'H2', 'G3', 'F4', 'E5', 'D6', 'C7', 'B8', 'A9']);
  });

  it('labels units for display', () => {
    expect(UNITS.map(String).slice(8, 10)).toEqual(['Row I', 'Column 1']);
    expect(String(UNITS[28])).toBe('Diagonal 2');
  });
});

describe('unitsOf', () => {
  it('returns three units for off-diagonal cells', () => {
    expect(unitsOf('A2').map(String)).toEqual(['Row A', 'Column 2', 'Box 1']);
  });

  it('adds the diagonal for diagonal cells', () => {
    expect(unitsOf('I1')).toHaveLength(4);
    expect(unitsOf('E5')).toHaveLength(5);
  });

  it('throws for unknown cells', () => {
    expect(() => unitsOf('J1')).toThrow('Unknown cell: J1');
  });
});

describe('CELL_REFS', () => {
  it('lists the 81 cells in row-major order', () => {
    expect(CELL_REFS).toHaveLength(81);
    expect(CELL_REFS.slice(8, 10)).toEqual(['A9', 'B1']);
  });
});

describe('peersOf', () => {
  it('has 20 peers for off-diagonal cells', () => {
    expect(peersOf('A2').size).toBe(20);
    expect(peersOf('E1').size).toBe(20);
  });

  it('has more peers for diagonal cells', () => {
    expect(peersOf('A1').size).toBe(26);
    expect(peersOf('C7').size).toBe(26);
    expect(peersOf('E5').size).toBe(32);
  });

  it('never includes the cell itself', () => {
    for (const ref of CELL_REFS) {
      expect(peersOf(ref).has(ref)).toBe(false);
    }
  });

  it('is symmetric', () => {
    for (const ref of CELL_REFS) {
      for (const peer of peersOf(ref)) {
        expect(peersOf(peer).has(ref)).toBe(true);
      }
    }
  });
});
