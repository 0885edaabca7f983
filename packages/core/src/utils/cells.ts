import type { CellValue } from '../types';

const INTEGER_TEXT = /^[+-]?\d+(?:\.0*)?$/;

export function isEmptyCell(cell: CellValue | undefined): boolean {
  if (cell === null || cell === undefined) return true;
  if (typeof cell === 'string') return cell.trim() === '';
  return false;
}

export function isBlankRow(cells: CellValue[]): boolean {
  return cells.every(isEmptyCell);
}

/** Plain text of a header cell; null reads as ''. */
export function cellText(cell: CellValue | undefined): string {
  if (cell === null || cell === undefined) return '';
  if (typeof cell === 'number') return String(cell);
  return cell.trim();
}

/**
 * Strict integer reading used for key columns: whole numbers only,
 * text must be a complete integer literal ("3.0" counts).
 */
export function parseIntegerCell(cell: CellValue | undefined): number | undefined {
  if (cell === null || cell === undefined) return undefined;
  if (typeof cell === 'number') return Number.isInteger(cell) ? cell : undefined;
  const t = cell.trim();
  return INTEGER_TEXT.test(t) ? Number(t) : undefined;
}

/** Pads with null or truncates so the row has exactly `length` cells. */
export function alignRow(cells: CellValue[], length: number): CellValue[] {
  if (cells.length === length) return cells;
  if (cells.length > length) return cells.slice(0, length);
  return [...cells, ...new Array<CellValue>(length - cells.length).fill(null)];
}
