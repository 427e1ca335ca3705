import type { Board, Direction, SavedGame } from "../shared/gameTypes.js";

export type SoundEffect = "background" | "move" | "merge" | "game-over" | "achievement";

export interface GameStore {
  save(key: string, game: SavedGame): Promise<void>;
  /** Resolves to undefined on first run or when the stored record is unusable. */
  load(key: string): Promise<SavedGame | undefined>;
}

export interface AchievementProgress {
  score: number;
  moveCount: number;
  elapsedMs: number;
  usedUndo: boolean;
  board: Board;
  moveHistory: Direction[];
}

export interface AchievementObserver {
  evaluate(progress: AchievementProgress): Promise<string[]> | string[];
}

export interface AudioSink {
  play(effect: SoundEffect): void;
  dispose?(): void;
}
