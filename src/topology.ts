import { ensureNonNullable } from './typeGuards.ts';

export type UnitType = 'box' | 'column' | 'diagonal' | 'row';

export const ROW_LABELS = 'ABCDEFGHI';
export const COLUMN_LABELS = '123456789';
export const ALL_DIGITS = '123456789';
export const GRID_SIZE = 9;

const BOX_SIZE = 3;

const UNIT_TYPE_NAMES: Record<UnitType, string> = {
  box: 'Box',
  column: 'Column',
  diagonal: 'Diagonal',
  row: 'Row'
};

export class Unit {
  public readonly label: string;

  public constructor(public readonly type: UnitType, public readonly id: number, public readonly cells: readonly string[]) {
    switch (type) {
      case 'box':
      case 'diagonal':
        this.label = String(id);
        break;
      case 'column':
        this.label = COLUMN_LABELS.charAt(id - 1);
        break;
      case 'row':
        this.label = ROW_LABELS.charAt(id - 1);
        break;
      default: {
        const exhaustive: never = type;
        throw new Error(`Unknown unit type: ${String(exhaustive)}`);
      }
    }
  }

  public contains(ref: string): boolean {
    return this.cells.includes(ref);
  }

  public toString(): string {
    return `${UNIT_TYPE_NAMES[this.type]} ${this.label}`;
  }
}

export function buildUnits(): Unit[] {
  const rows = Array.from(ROW_LABELS, (row, i) => new Unit('row', i + 1, cross(row, COLUMN_LABELS)));
  const columns = Array.from(COLUMN_LABELS, (column, i) => new Unit('column', i + 1, cross(ROW_LABELS, column)));

  const rowBands = chunk(ROW_LABELS, BOX_SIZE);
  const columnStacks = chunk(COLUMN_LABELS, BOX_SIZE);
  const boxes: Unit[] = [];
  for (const band of rowBands) {
    for (const stack of columnStacks) {
      boxes.push(new Unit('box', boxes.length + 1, cross(band, stack)));
    }
  }

  const reversedRows = [...ROW_LABELS].reverse().join('');
  const diagonals = [
    new Unit('diagonal', 1, Array.from(ROW_LABELS, (row, i) => row + COLUMN_LABELS.charAt(i))),
    new Unit('diagonal', 2, Array.from(reversedRows, (row, i) => row + COLUMN_LABELS.charAt(i)))
  ];

  return [...rows, ...columns, ...boxes, ...diagonals];
}

export function cross(first: string, second: string): string[] {
  const result: string[] = [];
  for (const a of first) {
    for (const b of second) {
      result.push(a + b);
    }
  }
  return result;
}

export function peersOf(ref: string): ReadonlySet<string> {
  return ensureNonNullable(PEERS_BY_CELL.get(ref), `Unknown cell: ${ref}`);
}

export function unitsOf(ref: string): readonly Unit[] {
  return ensureNonNullable(UNITS_BY_CELL.get(ref), `Unknown cell: ${ref}`);
}

function chunk(labels: string, size: number): string[] {
  const result: string[] = [];
  for (let i = 0; i < labels.length; i += size) {
    result.push(labels.substring(i, i + size));
  }
  return result;
}

export const CELL_REFS: readonly string[] = cross(ROW_LABELS, COLUMN_LABELS);
export const UNITS: readonly Unit[] = buildUnits();

const UNITS_BY_CELL = new Map<string, readonly Unit[]>(
  CELL_REFS.map((ref) => [ref, UNITS.filter((unit) => unit.contains(ref))])
);

const PEERS_BY_CELL = new Map<string, ReadonlySet<string>>(
  CELL_REFS.map((ref) => {
    const peers = new Set<string>();
    for (const unit of ensureNonNullable(UNITS_BY_CELL.get(ref))) {
      for (const cell of unit.cells) {
        if (cell !== ref) {
          peers.add(cell);
        }
      }
    }
    return [ref, peers];
  })
);
