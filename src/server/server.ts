import cors from "cors";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { randomUUID } from "crypto";
import { createServer } from "http";
import type { Server as HttpServer } from "http";
import path from "path";
import { pathToFileURL } from "url";
import { Server as SocketIOServer } from "socket.io";
import type { Socket } from "socket.io";
import { SoundManager } from "../audio/SoundManager.js";
import type { AchievementObserver, GameStore } from "../game/collaborators.js";
import { GameSession } from "../game/gameSession.js";
import type { MoveResult, RandomSource } from "../shared/gameTypes.js";
import { isDirection } from "../shared/gridEngine.js";
import type {
  AudioSettingsRequest,
  ClientToServerEvents,
  GameResponse,
  MoveResponse,
  ServerToClientEvents,
  UndoResponse
} from "../shared/protocol.js";
import { FileGameStore, isValidStoreKey } from "../storage/fileStore.js";
import { loadConfig } from "./config.js";
import type { ServerConfig } from "./config.js";

export interface BackendOptions {
  config?: ServerConfig;
  store?: GameStore;
  achievements?: (gameId: string) => AchievementObserver | undefined;
  rng?: RandomSource;
}

interface SessionEntry {
  session: GameSession;
  audio: SoundManager;
  sockets: Set<string>;
  idleTimer?: NodeJS.Timeout;
}

type GameServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents>;
type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents>;
type ExpressApp = ReturnType<typeof express>;

interface BackendContext {
  io: GameServer;
  config: ServerConfig;
  options: BackendOptions;
  sessions: Map<string, SessionEntry>;
  opening: Map<string, Promise<SessionEntry>>;
}

const DIRECTION_ERROR = "direction must be one of up, down, left, right";

export function initializeBackend(
  app: ExpressApp,
  httpServer: HttpServer,
  options: BackendOptions = {}
) {
  const config = options.config ?? loadConfig();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json());

  const io: GameServer = new SocketIOServer(httpServer, {
    cors: {
      origin: config.corsOrigin,
      methods: ["GET", "POST", "PATCH", "DELETE"]
    }
  });
  const ctx: BackendContext = {
    io,
    config,
    options,
    sessions: new Map(),
    opening: new Map()
  };

  registerHttpRoutes(app, ctx);
  registerSocketHandlers(ctx);

  const close = async () => {
    await Promise.allSettled(ctx.opening.values());
    await Promise.all([...ctx.sessions.values()].map((entry) => closeSession(ctx, entry)));
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
  };

  return { io, sessions: ctx.sessions, close };
}

function registerHttpRoutes(app: ExpressApp, ctx: BackendContext) {
  app.get("/api/health", (_req: Request, res: Response) => {
    log("GET /api/health");
    res.json({ status: "ok" });
  });

  app.post(
    "/api/games",
    asyncRoute(async (req, res) => {
      log("POST /api/games", req.body);
      const requested: unknown = req.body?.gameId;
      let gameId: string;
      if (requested === undefined) {
        gameId = randomUUID();
      } else if (typeof requested === "string" && isValidStoreKey(requested)) {
        gameId = requested;
      } else {
        return res.status(400).json({ error: "gameId must be 1-64 letters, digits, - or _" });
      }
      const existing = ctx.sessions.get(gameId);
      if (existing) {
        touchSession(ctx, existing);
        const body: GameResponse = { gameId, game: existing.session.snapshot() };
        return res.json(body);
      }
      const pending = ctx.opening.get(gameId);
      if (pending) {
        const opened = await pending;
        const body: GameResponse = { gameId, game: opened.session.snapshot() };
        return res.json(body);
      }
      const entry = await openSession(ctx, gameId);
      const body: GameResponse = { gameId, game: entry.session.snapshot() };
      res.status(201).json(body);
    })
  );

  app.get("/api/games/:gameId", (req: Request, res: Response) => {
    log("GET /api/games/:gameId", req.params.gameId);
    const entry = findSession(ctx, req.params.gameId);
    if (!entry) {
      return res.status(404).json({ error: "Game not found" });
    }
    const body: GameResponse = { gameId: entry.session.gameId, game: entry.session.snapshot() };
    res.json(body);
  });

  app.post(
    "/api/games/:gameId/move",
    asyncRoute(async (req, res) => {
      log("POST /api/games/:gameId/move", req.params.gameId, req.body);
      const entry = findSession(ctx, req.params.gameId);
      if (!entry) {
        return res.status(404).json({ error: "Game not found" });
      }
      const direction: unknown = req.body?.direction;
      if (!isDirection(direction)) {
        return res.status(400).json({ error: DIRECTION_ERROR });
      }
      const outcome = await entry.session.move(direction);
      if (!outcome.success) {
        return res.status(409).json({ error: outcome.error });
      }
      publishMove(ctx, entry, outcome.result, outcome.achievements);
      const body: MoveResponse = {
        result: outcome.result,
        achievements: outcome.achievements,
        game: entry.session.snapshot()
      };
      res.json(body);
    })
  );

  app.post(
    "/api/games/:gameId/undo",
    asyncRoute(async (req, res) => {
      log("POST /api/games/:gameId/undo", req.params.gameId);
      const entry = findSession(ctx, req.params.gameId);
      if (!entry) {
        return res.status(404).json({ error: "Game not found" });
      }
      const result = await entry.session.undo();
      if (result.success) {
        broadcastGame(ctx, entry);
      }
      const body: UndoResponse = { ...result, game: entry.session.snapshot() };
      res.json(body);
    })
  );

  app.post(
    "/api/games/:gameId/restart",
    asyncRoute(async (req, res) => {
      log("POST /api/games/:gameId/restart", req.params.gameId);
      const entry = findSession(ctx, req.params.gameId);
      if (!entry) {
        return res.status(404).json({ error: "Game not found" });
      }
      const result = await entry.session.restart();
      if (!result.success) {
        return res.status(409).json({ error: result.error });
      }
      broadcastGame(ctx, entry);
      const body: GameResponse = { gameId: entry.session.gameId, game: entry.session.snapshot() };
      res.json(body);
    })
  );

  app.post(
    "/api/games/:gameId/best-score/reset",
    asyncRoute(async (req, res) => {
      log("POST /api/games/:gameId/best-score/reset", req.params.gameId);
      const entry = findSession(ctx, req.params.gameId);
      if (!entry) {
        return res.status(404).json({ error: "Game not found" });
      }
      const result = await entry.session.resetBestScore();
      if (!result.success) {
        return res.status(409).json({ error: result.error });
      }
      broadcastGame(ctx, entry);
      const body: GameResponse = { gameId: entry.session.gameId, game: entry.session.snapshot() };
      res.json(body);
    })
  );

  app.patch("/api/games/:gameId/audio", (req: Request, res: Response) => {
    log("PATCH /api/games/:gameId/audio", req.params.gameId, req.body);
    const entry = findSession(ctx, req.params.gameId);
    if (!entry) {
      return res.status(404).json({ error: "Game not found" });
    }
    const request = parseAudioSettings(req.body);
    if (!request) {
      return res.status(400).json({ error: "muted must be a boolean and volumes numbers" });
    }
    if (request.sfxVolume !== undefined) entry.audio.setSfxVolume(request.sfxVolume);
    if (request.bgmVolume !== undefined) entry.audio.setBgmVolume(request.bgmVolume);
    if (request.muted !== undefined) entry.audio.setMuted(request.muted);
    res.json(entry.audio.settings());
  });

  app.delete(
    "/api/games/:gameId",
    asyncRoute(async (req, res) => {
      log("DELETE /api/games/:gameId", req.params.gameId);
      const entry = findSession(ctx, req.params.gameId);
      if (!entry) {
        return res.status(404).json({ error: "Game not found" });
      }
      await closeSession(ctx, entry);
      res.status(204).send();
    })
  );
}

function registerSocketHandlers(ctx: BackendContext) {
  ctx.io.on("connection", (socket: GameSocket) => {
    log("socket connected", socket.id, socket.handshake.auth);
    const auth: unknown = socket.handshake.auth;
    const gameId = auth && typeof auth === "object" && "gameId" in auth ? auth.gameId : undefined;
    if (typeof gameId !== "string") {
      socket.emit("game:error", { message: "gameId required" });
      socket.disconnect(true);
      return;
    }
    const entry = ctx.sessions.get(gameId);
    if (!entry) {
      socket.emit("game:error", { message: "Game not found" });
      socket.disconnect(true);
      return;
    }

    void socket.join(gameId);
    entry.sockets.add(socket.id);
    touchSession(ctx, entry);
    log("socket join game", socket.id, gameId);
    socket.emit("game:update", entry.session.snapshot());

    socket.on("game:move", (payload: { direction?: unknown }) => {
      log("game:move", gameId, payload);
      const direction = payload?.direction;
      if (!isDirection(direction)) {
        socket.emit("game:error", { message: DIRECTION_ERROR });
        return;
      }
      entry.session
        .move(direction)
        .then((outcome) => {
          if (!outcome.success) {
            socket.emit("game:error", { message: outcome.error });
            return;
          }
          publishMove(ctx, entry, outcome.result, outcome.achievements);
        })
        .catch((error: unknown) => reportSocketFailure(socket, "game:move", error));
    });

    socket.on("game:undo", () => {
      log("game:undo", gameId);
      entry.session
        .undo()
        .then((result) => {
          if (!result.success) {
            socket.emit("game:error", { message: result.error ?? "Unable to undo." });
            return;
          }
          broadcastGame(ctx, entry);
        })
        .catch((error: unknown) => reportSocketFailure(socket, "game:undo", error));
    });

    socket.on("game:restart", () => {
      log("game:restart", gameId);
      entry.session
        .restart()
        .then((result) => {
          if (!result.success) {
            socket.emit("game:error", { message: result.error ?? "Unable to restart." });
            return;
          }
          broadcastGame(ctx, entry);
        })
        .catch((error: unknown) => reportSocketFailure(socket, "game:restart", error));
    });

    socket.on("disconnect", () => {
      log("socket disconnected", socket.id);
      entry.sockets.delete(socket.id);
      touchSession(ctx, entry);
    });
  });
}

function openSession(ctx: BackendContext, gameId: string): Promise<SessionEntry> {
  const audio = new SoundManager({
    muted: ctx.config.audioMuted,
    player: (cue) => {
      ctx.io.to(gameId).emit("game:sound", cue);
    }
  });
  const session = new GameSession({
    gameId,
    store: ctx.options.store ?? new FileGameStore(ctx.config.dataDir),
    achievements: ctx.options.achievements?.(gameId),
    audio,
    rng: ctx.options.rng
  });
  const entry: SessionEntry = { session, audio, sockets: new Set() };
  // Visible to other requests only once the stored game has been loaded.
  const opening = session
    .start()
    .then(
      () => {
        ctx.sessions.set(gameId, entry);
        touchSession(ctx, entry);
        return entry;
      },
      async (error: unknown) => {
        console.warn("[server] failed to open game", gameId, error);
        await session.dispose();
        throw error;
      }
    )
    .finally(() => {
      ctx.opening.delete(gameId);
    });
  ctx.opening.set(gameId, opening);
  return opening;
}

function findSession(ctx: BackendContext, gameId: string): SessionEntry | undefined {
  const entry = ctx.sessions.get(gameId);
  if (entry) touchSession(ctx, entry);
  return entry;
}

/** Restarts the idle countdown; sessions with a connected socket never expire. */
function touchSession(ctx: BackendContext, entry: SessionEntry) {
  if (entry.idleTimer) {
    clearTimeout(entry.idleTimer);
    entry.idleTimer = undefined;
  }
  const gameId = entry.session.gameId;
  if (ctx.sessions.get(gameId) !== entry || entry.sockets.size > 0) return;
  entry.idleTimer = setTimeout(() => {
    log("evicting idle game", gameId);
    closeSession(ctx, entry).catch((error: unknown) => {
      console.warn("[server] failed to evict game", gameId, error);
    });
  }, ctx.config.sessionIdleMs);
  entry.idleTimer.unref();
}

async function closeSession(ctx: BackendContext, entry: SessionEntry) {
  const gameId = entry.session.gameId;
  if (entry.idleTimer) {
    clearTimeout(entry.idleTimer);
    entry.idleTimer = undefined;
  }
  if (ctx.sessions.get(gameId) === entry) {
    ctx.sessions.delete(gameId);
  }
  await entry.session.dispose();
  ctx.io.to(gameId).disconnectSockets(true);
}

function publishMove(
  ctx: BackendContext,
  entry: SessionEntry,
  result: MoveResult,
  achievements: string[]
) {
  if (!result.moved) return;
  const room = ctx.io.to(entry.session.gameId);
  room.emit("game:moved", result);
  if (achievements.length) {
    room.emit("game:achievement", { ids: achievements });
  }
  broadcastGame(ctx, entry);
}

function broadcastGame(ctx: BackendContext, entry: SessionEntry) {
  ctx.io.to(entry.session.gameId).emit("game:update", entry.session.snapshot());
}

function parseAudioSettings(raw: unknown): AudioSettingsRequest | undefined {
  if (!raw || typeof raw !== "object") return undefined;
  const muted = "muted" in raw ? raw.muted : undefined;
  const sfxVolume = "sfxVolume" in raw ? raw.sfxVolume : undefined;
  const bgmVolume = "bgmVolume" in raw ? raw.bgmVolume : undefined;
  if (muted !== undefined && typeof muted !== "boolean") return undefined;
  if (sfxVolume !== undefined && typeof sfxVolume !== "number") return undefined;
  if (bgmVolume !== undefined && typeof bgmVolume !== "number") return undefined;
  return { muted, sfxVolume, bgmVolume };
}

function asyncRoute(
  handler: (req: Request, res: Response) => Promise<unknown>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res).catch((error: unknown) => {
      console.error("[server] request failed", req.method, req.path, error);
      if (res.headersSent) {
        next(error);
        return;
      }
      res.status(500).json({ error: "Internal server error" });
    });
  };
}

function reportSocketFailure(socket: GameSocket, event: string, error: unknown) {
  console.error("[server] socket handler failed", event, error);
  socket.emit("game:error", { message: "Internal server error" });
}

function log(...args: unknown[]) {
  console.log("[server]", ...args);
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return pathToFileURL(path.resolve(entry)).href === import.meta.url;
}

if (isMainModule()) {
  const config = loadConfig();
  const app = express();
  const httpServer = createServer(app);
  initializeBackend(app, httpServer, { config });
  httpServer.listen(config.port, config.host, () => {
    console.log(`2048 server listening on ${config.host}:${config.port}, saving to ${config.dataDir}`);
  });
}
