import type { Direction } from "../shared/gameTypes.js";
import type {
  AudioSettings,
  AudioSettingsRequest,
  GameResponse,
  MoveResponse,
  UndoResponse
} from "../shared/protocol.js";

type FetchLike = typeof fetch;

export interface GameApi {
  health(): Promise<{ status: string }>;
  createGame(gameId?: string): Promise<GameResponse>;
  getGame(gameId: string): Promise<GameResponse>;
  move(gameId: string, direction: Direction): Promise<MoveResponse>;
  undo(gameId: string): Promise<UndoResponse>;
  restart(gameId: string): Promise<GameResponse>;
  resetBestScore(gameId: string): Promise<GameResponse>;
  updateAudio(gameId: string, settings: AudioSettingsRequest): Promise<AudioSettings>;
  closeGame(gameId: string): Promise<void>;
}

export function createGameApi(baseUrl: string, fetchImpl: FetchLike = fetch): GameApi {
  const base = baseUrl.replace(/\/+$/, "");

  async function send(path: string, options: RequestInit): Promise<Response> {
    console.log("[client][api]", options.method ?? "GET", path, options.body ?? "");
    const res = await fetchImpl(`${base}${path}`, {
      headers: {
        "Content-Type": "application/json"
      },
      ...options
    });
    if (!res.ok) {
      const err: unknown = await res.json().catch(() => ({}));
      console.warn("[client][api] error", path, err);
      throw new Error(readError(err) ?? res.statusText);
    }
    console.log("[client][api] success", path);
    return res;
  }

  async function request<T>(path: string, options: RequestInit): Promise<T> {
    const res = await send(path, options);
    return (await res.json()) as T;
  }

  const gamePath = (gameId: string) => `/api/games/${encodeURIComponent(gameId)}`;

  return {
    health: () => request("/api/health", { method: "GET" }),
    createGame: (gameId) =>
      request("/api/games", {
        method: "POST",
        body: JSON.stringify(gameId === undefined ? {} : { gameId })
      }),
    getGame: (gameId) => request(gamePath(gameId), { method: "GET" }),
    move: (gameId, direction) =>
      request(`${gamePath(gameId)}/move`, {
        method: "POST",
        body: JSON.stringify({ direction })
      }),
    undo: (gameId) => request(`${gamePath(gameId)}/undo`, { method: "POST" }),
    restart: (gameId) => request(`${gamePath(gameId)}/restart`, { method: "POST" }),
    resetBestScore: (gameId) =>
      request(`${gamePath(gameId)}/best-score/reset`, { method: "POST" }),
    updateAudio: (gameId, settings) =>
      request(`${gamePath(gameId)}/audio`, {
        method: "PATCH",
        body: JSON.stringify(settings)
      }),
    closeGame: async (gameId) => {
      await send(gamePath(gameId), { method: "DELETE" });
    }
  };
}

function readError(body: unknown): string | undefined {
  if (body && typeof body === "object" && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return undefined;
}
