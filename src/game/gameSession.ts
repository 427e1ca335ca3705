import {
  addLogEntry,
  applyMove,
  createInitialGameState,
  resetBestScore as sharedResetBestScore,
  restoreGameState,
  startNewGame,
  toPublicGameState,
  toSavedGame,
  undoMove
} from "../shared/rules.js";
import type { ActionResult, GameState } from "../shared/rules.js";
import type { Direction, GameSnapshot, MoveResult, RandomSource } from "../shared/gameTypes.js";
import { cloneBoard } from "../shared/gridEngine.js";
import type { AchievementObserver, AudioSink, GameStore } from "./collaborators.js";

export interface GameSessionOptions {
  gameId?: string;
  store?: GameStore;
  achievements?: AchievementObserver;
  audio?: AudioSink;
  rng?: RandomSource;
  now?: () => number;
}

export type SessionMoveOutcome =
  | { success: true; result: MoveResult; achievements: string[] }
  | { success: false; error: string };

const CLOSED_ERROR = "Game session has been closed.";

/**
 * One player's game. Owns the state and talks to the collaborators it was
 * given; none of them is shared with other sessions.
 */
export class GameSession {
  public readonly gameId: string;
  private game: GameState;
  private readonly store?: GameStore;
  private readonly achievements?: AchievementObserver;
  private readonly audio?: AudioSink;
  private readonly rng: RandomSource;
  private readonly now: () => number;
  private readonly unlocked = new Set<string>();
  private pending: Promise<void> = Promise.resolve();
  private disposed = false;

  constructor(options: GameSessionOptions = {}) {
    this.gameId = options.gameId ?? "local-game";
    this.store = options.store;
    this.achievements = options.achievements;
    this.audio = options.audio;
    this.rng = options.rng ?? Math.random;
    this.now = options.now ?? Date.now;
    this.game = createInitialGameState(this.rng, this.now());
  }

  public get closed(): boolean {
    return this.disposed;
  }

  /** Resumes the stored game for this id, or keeps the fresh board and stores it. */
  public start(): Promise<GameSnapshot> {
    return this.enqueue(async () => {
      const saved = await this.store?.load(this.gameId);
      if (saved) {
        this.game = restoreGameState(saved, this.now());
      } else {
        await this.persist();
      }
      this.audio?.play("background");
      return this.snapshot();
    });
  }

  public move(direction: Direction): Promise<SessionMoveOutcome> {
    return this.enqueue<SessionMoveOutcome>(async () => {
      if (this.disposed) return { success: false, error: CLOSED_ERROR };
      const result = applyMove(this.game, direction, this.rng);
      if (!result.moved) {
        return { success: true, result, achievements: [] };
      }
      this.audio?.play(result.merges > 0 ? "merge" : "move");
      if (result.gameOver) {
        this.audio?.play("game-over");
      }
      const achievements = await this.checkAchievements();
      await this.persist();
      return { success: true, result, achievements };
    });
  }

  public undo(): Promise<ActionResult> {
    return this.enqueue(async () => {
      if (this.disposed) return { success: false, error: CLOSED_ERROR };
      const result = undoMove(this.game);
      if (result.success) {
        await this.persist();
      }
      return result;
    });
  }

  public restart(): Promise<ActionResult> {
    return this.enqueue(async () => {
      if (this.disposed) return { success: false, error: CLOSED_ERROR };
      startNewGame(this.game, this.rng, this.now());
      await this.persist();
      return { success: true };
    });
  }

  public resetBestScore(): Promise<ActionResult> {
    return this.enqueue(async () => {
      if (this.disposed) return { success: false, error: CLOSED_ERROR };
      sharedResetBestScore(this.game);
      await this.persist();
      return { success: true };
    });
  }

  public snapshot(): GameSnapshot {
    return toPublicGameState(this.game);
  }

  public unlockedAchievements(): string[] {
    return [...this.unlocked];
  }

  /** Waits for queued work, then releases the audio sink. */
  public dispose(): Promise<void> {
    return this.enqueue(async () => {
      if (this.disposed) return;
      this.disposed = true;
      this.audio?.dispose?.();
    });
  }

  private async checkAchievements(): Promise<string[]> {
    if (!this.achievements) return [];
    let ids: string[];
    try {
      ids = await this.achievements.evaluate({
        score: this.game.score,
        moveCount: this.game.moveCount,
        elapsedMs: Math.max(0, this.now() - this.game.startedAt),
        usedUndo: this.game.usedUndo,
        board: cloneBoard(this.game.board),
        moveHistory: [...this.game.moveHistory]
      });
    } catch (error) {
      console.warn("[session] achievement check failed", this.gameId, error);
      return [];
    }
    const fresh = [...new Set(ids)].filter((id) => !this.unlocked.has(id));
    fresh.forEach((id) => {
      this.unlocked.add(id);
      addLogEntry(this.game, `Achievement unlocked: ${id}.`);
      this.audio?.play("achievement");
    });
    return fresh;
  }

  private async persist() {
    await this.store?.save(this.gameId, toSavedGame(this.game));
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task);
    this.pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
