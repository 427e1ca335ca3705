import { BOARD_SIZE, DIRECTIONS, INITIAL_TILE_COUNT, TWO_TILE_CHANCE } from "./constants.js";
import type {
  Board,
  Direction,
  MoveResult,
  RandomSource,
  SpawnedTile,
  UndoSnapshot
} from "./gameTypes.js";

export interface LineResult {
  line: number[];
  scoreGained: number;
  merges: number;
}

export interface SlideResult {
  board: Board;
  scoreGained: number;
  merges: number;
  moved: boolean;
}

export type UndoResult =
  | { success: true; board: Board; score: number }
  | { success: false };

type Cell = [row: number, col: number];

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, () => 0));
}

export function cloneBoard(board: Board): Board {
  return board.map((row) => row.slice());
}

export function getEmptyCells(board: Board): Cell[] {
  const empties: Cell[] = [];
  for (let r = 0; r < BOARD_SIZE; r += 1) {
    for (let c = 0; c < BOARD_SIZE; c += 1) {
      if (board[r][c] === 0) empties.push([r, c]);
    }
  }
  return empties;
}

/**
 * Places a 2 (or, one time in ten, a 4) on a random empty cell.
 * The first draw picks the cell, the second the value. A full board is
 * returned as is.
 */
export function spawnTile(board: Board, rng: RandomSource = Math.random): Board {
  return spawnTileAt(board, rng).board;
}

export function spawnTileAt(
  board: Board,
  rng: RandomSource = Math.random
): { board: Board; spawned?: SpawnedTile } {
  const empties = getEmptyCells(board);
  if (empties.length === 0) return { board };
  const index = Math.min(empties.length - 1, Math.floor(rng() * empties.length));
  const [row, col] = empties[index];
  const value = rng() < TWO_TILE_CHANCE ? 2 : 4;
  const next = cloneBoard(board);
  next[row][col] = value;
  return { board: next, spawned: { row, col, value } };
}

export function reset(rng: RandomSource = Math.random): { board: Board; score: number } {
  let board = createEmptyBoard();
  for (let i = 0; i < INITIAL_TILE_COUNT; i += 1) {
    board = spawnTile(board, rng);
  }
  return { board, score: 0 };
}

/**
 * Slides one line toward index 0. A pair merges at most once per pass,
 * so [2, 2, 2, 2] becomes [4, 4, 0, 0].
 */
export function compactLine(line: number[]): LineResult {
  const tiles = line.filter((value) => value !== 0);
  const result: number[] = [];
  let scoreGained = 0;
  let merges = 0;
  let i = 0;
  while (i < tiles.length) {
    if (i + 1 < tiles.length && tiles[i] === tiles[i + 1]) {
      const merged = tiles[i] * 2;
      result.push(merged);
      scoreGained += merged;
      merges += 1;
      i += 2;
    } else {
      result.push(tiles[i]);
      i += 1;
    }
  }
  while (result.length < line.length) result.push(0);
  return { line: result, scoreGained, merges };
}

// Cells of one line ordered from the edge the tiles travel toward.
function lineCells(direction: Direction, index: number): Cell[] {
  const cells: Cell[] = [];
  for (let step = 0; step < BOARD_SIZE; step += 1) {
    const far = BOARD_SIZE - 1 - step;
    switch (direction) {
      case "left":
        cells.push([index, step]);
        break;
      case "right":
        cells.push([index, far]);
        break;
      case "up":
        cells.push([step, index]);
        break;
      case "down":
        cells.push([far, index]);
        break;
    }
  }
  return cells;
}

export function slideBoard(board: Board, direction: Direction): SlideResult {
  const next = cloneBoard(board);
  let scoreGained = 0;
  let merges = 0;
  let moved = false;
  for (let index = 0; index < BOARD_SIZE; index += 1) {
    const cells = lineCells(direction, index);
    const before = cells.map(([r, c]) => board[r][c]);
    const outcome = compactLine(before);
    scoreGained += outcome.scoreGained;
    merges += outcome.merges;
    cells.forEach(([r, c], position) => {
      const value = outcome.line[position];
      if (value !== before[position]) moved = true;
      next[r][c] = value;
    });
  }
  return { board: next, scoreGained, merges, moved };
}

export function move(
  board: Board,
  score: number,
  direction: Direction,
  rng: RandomSource = Math.random
): MoveResult {
  const slid = slideBoard(board, direction);
  if (!slid.moved) {
    return { board, score, moved: false, gameOver: false, scoreGained: 0, merges: 0 };
  }
  const { board: spawnedBoard, spawned } = spawnTileAt(slid.board, rng);
  return {
    board: spawnedBoard,
    score: score + slid.scoreGained,
    moved: true,
    gameOver: isTerminal(spawnedBoard),
    scoreGained: slid.scoreGained,
    merges: slid.merges,
    spawned
  };
}

export function isTerminal(board: Board): boolean {
  for (let r = 0; r < BOARD_SIZE; r += 1) {
    for (let c = 0; c < BOARD_SIZE; c += 1) {
      const value = board[r][c];
      if (value === 0) return false;
      if (c + 1 < BOARD_SIZE && board[r][c + 1] === value) return false;
      if (r + 1 < BOARD_SIZE && board[r + 1][c] === value) return false;
    }
  }
  return true;
}

export function snapshotForUndo(board: Board, score: number): UndoSnapshot {
  return { board: cloneBoard(board), score, consumed: false };
}

export function undo(snapshot: UndoSnapshot | undefined): UndoResult {
  if (!snapshot || snapshot.consumed) return { success: false };
  snapshot.consumed = true;
  return { success: true, board: cloneBoard(snapshot.board), score: snapshot.score };
}

export function isDirection(value: unknown): value is Direction {
  return typeof value === "string" && DIRECTIONS.some((direction) => direction === value);
}

export function isTileValue(value: unknown): value is number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) return false;
  if (value === 0) return true;
  if (value < 2) return false;
  let rest = value;
  while (rest % 2 === 0) rest /= 2;
  return rest === 1;
}

export function isValidBoard(value: unknown): value is Board {
  return (
    Array.isArray(value) &&
    value.length === BOARD_SIZE &&
    value.every(
      (row: unknown) =>
        Array.isArray(row) && row.length === BOARD_SIZE && row.every((cell: unknown) => isTileValue(cell))
    )
  );
}

export function flattenBoard(board: Board): number[] {
  return board.flat();
}

export function unflattenBoard(cells: unknown): Board | undefined {
  if (!Array.isArray(cells) || cells.length !== BOARD_SIZE * BOARD_SIZE) return undefined;
  const board = Array.from({ length: BOARD_SIZE }, (_, r) =>
    cells.slice(r * BOARD_SIZE, (r + 1) * BOARD_SIZE)
  );
  return isValidBoard(board) ? board : undefined;
}

export function highestTile(board: Board): number {
  return board.reduce((max, row) => Math.max(max, ...row), 0);
}
