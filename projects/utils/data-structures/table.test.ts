import { Table } from './table.js';

describe('Table', () => {
  test('init() fills every cell', () => {
    const table = Table.init(2, 3, () => 0);
    expect(table.numRows).toEqual(2);
    expect(table.numCols).toEqual(3);
    expect(table.getCell(1, 2)).toEqual(0);
  });

  test('addCol() extends existing rows', () => {
    const table = Table.init(2, 1, () => 'x');
    table.addCol(() => 'y');
    expect(table.getCell(0, 1)).toEqual('y');
    expect(table.getCell(1, 1)).toEqual('y');
  });

  test('setCell() checks bounds', () => {
    const table = Table.init(1, 1, () => '');
    expect(() => table.setCell(1, 0, 'a')).toThrow(
      'TableIndexError: Invalid row 1. Must be between 0 and 0 inclusive'
    );
    expect(() => table.setCell(0, 2, 'a')).toThrow(
      'TableIndexError: Invalid col 2. Must be between 0 and 0 inclusive'
    );
  });

  test('toDebugStr() right aligns columns', () => {
    const table = Table.init(2, 2, () => '');
    table.setCell(0, 0, 'a');
    table.setCell(0, 1, 'bb');
    table.setCell(1, 0, 'ccc');
    table.setCell(1, 1, 'd');
    expect(table.toDebugStr()).toEqual('    a  bb\n  ccc   d\n');
  });
});
