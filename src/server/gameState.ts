import { LOG_LIMIT, MOVE_HISTORY_LIMIT } from "../shared/constants.js";
import type {
  Direction,
  GameSnapshot,
  MoveResult,
  RandomSource,
  SavedGame
} from "../shared/gameTypes.js";
import {
  cloneBoard,
  isTerminal,
  move,
  reset,
  snapshotForUndo,
  undo
} from "../shared/gridEngine.js";
import type { ActionResult, GameState } from "./types.js";

export function createInitialGameState(
  rng: RandomSource = Math.random,
  now: number = Date.now()
): GameState {
  const { board, score } = reset(rng);
  return {
    board,
    score,
    bestScore: 0,
    moveCount: 0,
    moveHistory: [],
    usedUndo: false,
    startedAt: now,
    completed: false,
    undo: undefined,
    log: []
  };
}

/** Clears the board, score, undo slot and statistics. The best score survives. */
export function startNewGame(
  game: GameState,
  rng: RandomSource = Math.random,
  now: number = Date.now()
) {
  const fresh = createInitialGameState(rng, now);
  game.board = fresh.board;
  game.score = fresh.score;
  game.moveCount = 0;
  game.moveHistory = [];
  game.usedUndo = false;
  game.startedAt = now;
  game.completed = false;
  game.undo = undefined;
  addLogEntry(game, "New game started.");
}

export function restoreGameState(saved: SavedGame, now: number = Date.now()): GameState {
  return {
    board: cloneBoard(saved.board),
    score: saved.score,
    bestScore: Math.max(saved.bestScore, saved.score),
    moveCount: 0,
    moveHistory: [],
    usedUndo: false,
    startedAt: now,
    completed: isTerminal(saved.board),
    undo: undefined,
    log: ["Saved game restored."]
  };
}

export function applyMove(
  game: GameState,
  direction: Direction,
  rng: RandomSource = Math.random
): MoveResult {
  const result = move(game.board, game.score, direction, rng);
  if (!result.moved) {
    return result;
  }
  // Only board-changing moves replace the undo slot.
  game.undo = snapshotForUndo(game.board, game.score);
  game.board = result.board;
  game.score = result.score;
  game.bestScore = Math.max(game.bestScore, game.score);
  game.moveCount += 1;
  game.moveHistory.push(direction);
  if (game.moveHistory.length > MOVE_HISTORY_LIMIT) {
    game.moveHistory.shift();
  }
  if (result.merges > 0) {
    addLogEntry(
      game,
      `Move ${game.moveCount} (${direction}): ${result.merges} merge(s) for +${result.scoreGained}.`
    );
  }
  if (result.gameOver) {
    game.completed = true;
    addLogEntry(game, `Game over with ${game.score} pts after ${game.moveCount} moves.`);
  }
  return result;
}

export function undoMove(game: GameState): ActionResult {
  const restored = undo(game.undo);
  game.undo = undefined;
  if (!restored.success) {
    return { success: false, error: "Nothing to undo." };
  }
  game.board = restored.board;
  game.score = restored.score;
  game.usedUndo = true;
  game.completed = isTerminal(game.board);
  addLogEntry(game, `Undo: score back to ${game.score}.`);
  return { success: true };
}

export function resetBestScore(game: GameState) {
  game.bestScore = 0;
  addLogEntry(game, "Best score reset.");
}

export function toSavedGame(game: GameState): SavedGame {
  return { board: cloneBoard(game.board), score: game.score, bestScore: game.bestScore };
}

export function toPublicGameState(game: GameState): GameSnapshot {
  return {
    board: cloneBoard(game.board),
    score: game.score,
    bestScore: game.bestScore,
    moveCount: game.moveCount,
    moveHistory: [...game.moveHistory],
    usedUndo: game.usedUndo,
    canUndo: Boolean(game.undo && !game.undo.consumed),
    startedAt: game.startedAt,
    completed: game.completed,
    log: [...game.log]
  };
}

export function addLogEntry(game: GameState, message: string) {
  game.log.push(message);
  if (game.log.length > LOG_LIMIT) {
    game.log.shift();
  }
}
