import { attribute, childElements, childPath, firstChild, type XmlNode } from '@/lib/document-processing/xml-tree';
import { RowStructureError, TableStructureError } from '@/lib/utils/errors';
import { cellText } from './word-text';

interface GridSlot {
  cell: XmlNode;
  /** Grid column where the covering w:tc starts */
  start: number;
}

function readGridValue(properties: XmlNode | undefined, name: string, rowIndex: number, fallback: number): number {
  const element = properties ? firstChild(properties, name) : undefined;
  if (!element) return fallback;
  const raw = attribute(element, 'w:val');
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new RowStructureError(`Row ${rowIndex}: invalid ${name} value "${raw}"`, rowIndex);
  }
  return value;
}

function isVerticalContinuation(cell: XmlNode): boolean {
  const vMerge = childPath(cell, ['w:tcPr', 'w:vMerge']);
  if (!vMerge) return false;
  const val = attribute(vMerge, 'w:val');
  return val === undefined || val === 'continue';
}

/**
 * Grid/cell model of a w:tbl.
 *
 * Maps each row's w:tc elements onto the table's grid columns (w:tblGrid), the way a
 * word processor lays them out: a w:gridSpan cell covers several columns and is
 * reported once per column, and a w:vMerge continuation stands for the cell above it.
 * Rows are expected to be resolved top to bottom; vertical merges read the layout of
 * the previous row.
 */
export class WordTable {
  readonly columnCount: number;
  readonly rows: XmlNode[];
  private layouts = new Map<number, Array<GridSlot | undefined>>();

  /**
   * @throws TableStructureError when the table has no usable grid.
   */
  constructor(table: XmlNode, readonly tableIndex: number) {
    const grid = firstChild(table, 'w:tblGrid');
    if (!grid) {
      throw new TableStructureError(`Table ${tableIndex} has no w:tblGrid`, tableIndex);
    }
    this.columnCount = childElements(grid, 'w:gridCol').length;
    if (this.columnCount === 0) {
      throw new TableStructureError(`Table ${tableIndex} grid defines no columns`, tableIndex);
    }
    this.rows = childElements(table, 'w:tr');
  }

  /**
   * Visible text of every grid cell in the row, left to right.
   * @throws RowStructureError when the row's cells cannot be placed on the grid.
   */
  resolveRowCells(rowIndex: number): string[] {
    return this.resolveRowLayout(rowIndex).map(slot => cellText(slot.cell));
  }

  private resolveRowLayout(rowIndex: number): GridSlot[] {
    const row = this.rows[rowIndex];
    if (!row) {
      throw new RowStructureError(`Row ${rowIndex} does not exist`, rowIndex);
    }

    const rowProperties = firstChild(row, 'w:trPr');
    const gridBefore = readGridValue(rowProperties, 'w:gridBefore', rowIndex, 0);
    const gridAfter = readGridValue(rowProperties, 'w:gridAfter', rowIndex, 0);

    const layout: Array<GridSlot | undefined> = Array.from({ length: gridBefore }, () => undefined);
    const resolved: GridSlot[] = [];
    const above = this.layouts.get(rowIndex - 1);

    for (const cell of childElements(row, 'w:tc')) {
      const start = layout.length;
      const span = readGridValue(firstChild(cell, 'w:tcPr'), 'w:gridSpan', rowIndex, 1);
      if (span === 0) {
        throw new RowStructureError(`Row ${rowIndex}: cell at grid column ${start} spans no columns`, rowIndex);
      }

      let slot: GridSlot = { cell, start };
      if (isVerticalContinuation(cell)) {
        const top = rowIndex > 0 ? above?.[start] : undefined;
        if (!top || top.start !== start) {
          throw new RowStructureError(
            `Row ${rowIndex}: no cell starts at grid column ${start} in the row above`,
            rowIndex
          );
        }
        slot = top;
      }

      for (let i = 0; i < span; i++) {
        layout.push({ cell: slot.cell, start });
        resolved.push(slot);
      }
    }

    const width = layout.length + gridAfter;
    if (width > this.columnCount) {
      throw new RowStructureError(
        `Row ${rowIndex} covers ${width} grid columns but the table grid has ${this.columnCount}`,
        rowIndex
      );
    }

    this.layouts.set(rowIndex, layout);
    return resolved;
  }
}
