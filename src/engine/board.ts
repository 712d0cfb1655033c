import { boardKey } from '../constants/board';
import type { Board, Position } from '../types';

/** Row first, then column. Every tie-break in the engine goes through this. */
export const compareReadingOrder = (a: Position, b: Position): number => a.row - b.row || a.col - b.col;

export const samePosition = (a: Position, b: Position) => a.row === b.row && a.col === b.col;

export const positionKey = (pos: Position) => boardKey(pos.row, pos.col);

// Up, left, right, down: already in reading order
export const orthogonalNeighbors = ({ row, col }: Position): Position[] => [
  { row: row - 1, col },
  { row, col: col - 1 },
  { row, col: col + 1 },
  { row: row + 1, col }
];

export const createBoard = (rows: number, cols: number, tiles: Iterable<Position>): Board => ({
  rows,
  cols,
  tiles: new Set(Array.from(tiles, positionKey))
});

export const boardContains = (board: Board, pos: Position): boolean => board.tiles.has(positionKey(pos));
