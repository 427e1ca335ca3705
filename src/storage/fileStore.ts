import { promises as fs } from "fs";
import path from "path";
import type { GameStore } from "../game/collaborators.js";
import type { SavedGame } from "../shared/gameTypes.js";
import { flattenBoard, unflattenBoard } from "../shared/gridEngine.js";

const KEY_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

interface StoredRecord {
  board: number[];
  score: number;
  bestScore: number;
  savedAt: number;
}

export function isValidStoreKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

function isScore(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function parseSavedGame(raw: unknown): SavedGame | undefined {
  if (!raw || typeof raw !== "object") return undefined;
  const board = "board" in raw ? raw.board : undefined;
  const score = "score" in raw ? raw.score : undefined;
  const bestScore = "bestScore" in raw ? raw.bestScore : undefined;
  const grid = unflattenBoard(board);
  if (!grid || !isScore(score) || !isScore(bestScore)) return undefined;
  return { board: grid, score, bestScore };
}

/**
 * Keeps one JSON document per game under `dir`. Read and write failures are
 * logged and reported as "nothing saved" so callers fall back to a new game.
 */
export class FileGameStore implements GameStore {
  constructor(private readonly dir: string) {}

  async save(key: string, game: SavedGame): Promise<void> {
    const filePath = this.pathFor(key);
    if (!filePath) {
      console.warn("[store] refusing to save invalid key", key);
      return;
    }
    const record: StoredRecord = {
      board: flattenBoard(game.board),
      score: game.score,
      bestScore: game.bestScore,
      savedAt: Date.now()
    };
    const tempPath = `${filePath}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(record), "utf8");
      await fs.rename(tempPath, filePath);
    } catch (error) {
      console.warn("[store] failed to save game", key, error);
    }
  }

  async load(key: string): Promise<SavedGame | undefined> {
    const filePath = this.pathFor(key);
    if (!filePath) return undefined;
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      console.warn("[store] failed to read game", key, error);
      return undefined;
    }
    try {
      const saved = parseSavedGame(JSON.parse(raw));
      if (!saved) {
        console.warn("[store] discarding malformed save", key);
      }
      return saved;
    } catch (error) {
      console.warn("[store] discarding unreadable save", key, error);
      return undefined;
    }
  }

  private pathFor(key: string): string | undefined {
    if (!isValidStoreKey(key)) return undefined;
    return path.join(this.dir, `${key}.json`);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
