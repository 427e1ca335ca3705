import type { DIRECTIONS } from "./constants.js";

export type Direction = (typeof DIRECTIONS)[number];

/** Row-major 4x4 grid. 0 marks an empty cell, anything else is a power of two. */
export type Board = number[][];

export type RandomSource = () => number;

export interface SpawnedTile {
  row: number;
  col: number;
  value: number;
}

export interface UndoSnapshot {
  board: Board;
  score: number;
  consumed: boolean;
}

export interface MoveResult {
  board: Board;
  score: number;
  moved: boolean;
  gameOver: boolean;
  scoreGained: number;
  merges: number;
  spawned?: SpawnedTile;
}

export interface SavedGame {
  board: Board;
  score: number;
  bestScore: number;
}

export interface GameSnapshot {
  board: Board;
  score: number;
  bestScore: number;
  moveCount: number;
  moveHistory: Direction[];
  usedUndo: boolean;
  canUndo: boolean;
  startedAt: number;
  completed: boolean;
  log: string[];
}
