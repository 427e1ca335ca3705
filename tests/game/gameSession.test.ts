import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { GameSession } from "../../src/game/gameSession.js";
import type {
  AchievementObserver,
  AudioSink,
  GameStore,
  SoundEffect
} from "../../src/game/collaborators.js";
import type { Board, SavedGame } from "../../src/shared/gameTypes.js";

const withTopRow = (row: number[]): Board => [row, [0, 0, 0, 0], [0, 0, 0, 0], [0, 0, 0, 0]];

class MemoryStore implements GameStore {
  public readonly saved = new Map<string, SavedGame>();
  public save = vi.fn(async (key: string, game: SavedGame) => {
    this.saved.set(key, game);
  });
  public load = vi.fn(async (key: string) => this.saved.get(key));
}

class RecordingAudio implements AudioSink {
  public readonly effects: SoundEffect[] = [];
  public dispose = vi.fn();
  play(effect: SoundEffect) {
    this.effects.push(effect);
  }
}

describe("GameSession", () => {
  let store: MemoryStore;
  let audio: RecordingAudio;
  let clock: number;

  const makeSession = (options: { achievements?: AchievementObserver; rng?: () => number } = {}) =>
    new GameSession({
      gameId: "g1",
      store,
      audio,
      achievements: options.achievements,
      rng: options.rng ?? (() => 0),
      now: () => clock
    });

  beforeEach(() => {
    store = new MemoryStore();
    audio = new RecordingAudio();
    clock = 1000;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stores a fresh game when nothing was saved", async () => {
    const session = makeSession();
    const snapshot = await session.start();
    expect(snapshot.board).toEqual(withTopRow([2, 2, 0, 0]));
    expect(store.save).toHaveBeenCalledWith("g1", {
      board: withTopRow([2, 2, 0, 0]),
      score: 0,
      bestScore: 0
    });
    expect(audio.effects).toEqual(["background"]);
  });

  it("resumes a saved game", async () => {
    store.saved.set("g1", { board: withTopRow([8, 8, 0, 0]), score: 48, bestScore: 96 });
    const session = makeSession();
    const snapshot = await session.start();
    expect(snapshot.board).toEqual(withTopRow([8, 8, 0, 0]));
    expect(snapshot.score).toBe(48);
    expect(snapshot.bestScore).toBe(96);
    expect(store.save).not.toHaveBeenCalled();
  });

  it("plays a merge cue, reports progress to achievements and saves after a move", async () => {
    store.saved.set("g1", { board: withTopRow([2, 2, 0, 0]), score: 10, bestScore: 20 });
    const evaluate = vi.fn(() => ["first-merge"]);
    const session = makeSession({ achievements: { evaluate } });
    await session.start();
    clock = 61000;

    const outcome = await session.move("left");

    expect(outcome).toEqual({
      success: true,
      result: expect.objectContaining({ moved: true, score: 14, scoreGained: 4 }),
      achievements: ["first-merge"]
    });
    expect(evaluate).toHaveBeenCalledWith({
      score: 14,
      moveCount: 1,
      elapsedMs: 60000,
      usedUndo: false,
      board: withTopRow([4, 2, 0, 0]),
      moveHistory: ["left"]
    });
    expect(audio.effects).toEqual(["background", "merge", "achievement"]);
    expect(store.saved.get("g1")).toEqual({
      board: withTopRow([4, 2, 0, 0]),
      score: 14,
      bestScore: 20
    });
    expect(session.unlockedAchievements()).toEqual(["first-merge"]);
  });

  it("reports each achievement only once", async () => {
    store.saved.set("g1", { board: withTopRow([0, 0, 0, 2]), score: 0, bestScore: 0 });
    const session = makeSession({
      achievements: { evaluate: () => ["mover", "mover"] },
      rng: () => 0.99
    });
    await session.start();

    const first = await session.move("left");
    const second = await session.move("right");
    expect(first.success && first.achievements).toEqual(["mover"]);
    expect(second.success && second.achievements).toEqual([]);
    expect(audio.effects).toEqual(["background", "move", "achievement", "move"]);
  });

  it("does nothing on a move that changes nothing", async () => {
    store.saved.set("g1", { board: withTopRow([2, 4, 0, 0]), score: 0, bestScore: 0 });
    const evaluate = vi.fn(() => []);
    const session = makeSession({ achievements: { evaluate } });
    await session.start();

    const outcome = await session.move("left");
    expect(outcome.success && outcome.result.moved).toBe(false);
    expect(evaluate).not.toHaveBeenCalled();
    expect(store.save).not.toHaveBeenCalled();
    expect(audio.effects).toEqual(["background"]);
    expect(session.snapshot().moveCount).toBe(0);
  });

  it("keeps playing when the achievement check fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    store.saved.set("g1", { board: withTopRow([2, 2, 0, 0]), score: 0, bestScore: 0 });
    const session = makeSession({
      achievements: {
        evaluate: async () => {
          throw new Error("offline");
        }
      }
    });
    await session.start();

    const outcome = await session.move("left");
    expect(outcome.success).toBe(true);
    expect(session.snapshot().score).toBe(4);
    expect(warn).toHaveBeenCalledWith("[session] achievement check failed", "g1", expect.any(Error));
  });

  it("runs queued moves in the order they arrived", async () => {
    store.saved.set("g1", { board: withTopRow([0, 0, 0, 2]), score: 0, bestScore: 0 });
    const session = makeSession({ rng: () => 0.99 });
    await session.start();

    const results = await Promise.all([session.move("left"), session.move("right")]);
    expect(results.every((outcome) => outcome.success && outcome.result.moved)).toBe(true);
    expect(session.snapshot().moveHistory).toEqual(["left", "right"]);
    expect(session.snapshot().board[0]).toEqual([0, 0, 0, 2]);
  });

  it("undoes one move and then refuses", async () => {
    store.saved.set("g1", { board: withTopRow([2, 2, 0, 0]), score: 6, bestScore: 6 });
    const session = makeSession();
    await session.start();
    await session.move("left");

    expect(await session.undo()).toEqual({ success: true });
    expect(session.snapshot().score).toBe(6);
    expect(session.snapshot().usedUndo).toBe(true);
    expect(store.saved.get("g1")?.score).toBe(6);
    expect(await session.undo()).toEqual({ success: false, error: "Nothing to undo." });
  });

  it("restarts and resets the best score", async () => {
    store.saved.set("g1", { board: withTopRow([8, 0, 0, 0]), score: 500, bestScore: 800 });
    const session = makeSession();
    await session.start();

    expect(await session.restart()).toEqual({ success: true });
    expect(session.snapshot().score).toBe(0);
    expect(session.snapshot().bestScore).toBe(800);

    expect(await session.resetBestScore()).toEqual({ success: true });
    expect(store.saved.get("g1")?.bestScore).toBe(0);
  });

  it("releases the audio sink and rejects play after dispose", async () => {
    const session = makeSession();
    await session.start();
    await session.dispose();
    await session.dispose();

    expect(audio.dispose).toHaveBeenCalledTimes(1);
    expect(session.closed).toBe(true);
    expect(await session.move("left")).toEqual({
      success: false,
      error: "Game session has been closed."
    });
    expect(await session.undo()).toEqual({
      success: false,
      error: "Game session has been closed."
    });
  });
});
