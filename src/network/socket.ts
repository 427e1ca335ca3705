import { io } from "socket.io-client";
import type { Socket } from "socket.io-client";
import { resolveSwipe } from "../input/swipe.js";
import type { SwipeVelocity } from "../input/swipe.js";
import type { Direction, GameSnapshot, MoveResult } from "../shared/gameTypes.js";
import type { ClientToServerEvents, ServerToClientEvents, SoundCue } from "../shared/protocol.js";

export interface GameSocketHandlers {
  onUpdate(game: GameSnapshot): void;
  onDisconnect(reason: string): void;
  onMoved?(result: MoveResult): void;
  onSound?(cue: SoundCue): void;
  onAchievement?(ids: string[]): void;
  onError?(message: string): void;
  onConnect?(): void;
}

export type RawGameSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

export interface GameSocket {
  socket: RawGameSocket;
  move(direction: Direction): void;
  /** Sends the swipe's direction; returns undefined when it was too slow to count. */
  swipe(velocity: SwipeVelocity): Direction | undefined;
  undo(): void;
  restart(): void;
  close(): void;
}

export function connectGameSocket(
  baseUrl: string,
  gameId: string,
  handlers: GameSocketHandlers
): GameSocket {
  console.log("[client][socket] connecting", gameId);
  const socket: RawGameSocket = io(baseUrl, {
    transports: ["websocket"],
    forceNew: true,
    reconnection: true,
    auth: { gameId }
  });

  socket.on("game:update", (game) => {
    handlers.onUpdate(game);
  });

  socket.on("game:moved", (result) => {
    handlers.onMoved?.(result);
  });

  socket.on("game:sound", (cue) => {
    handlers.onSound?.(cue);
  });

  socket.on("game:achievement", (payload) => {
    console.log("[client][socket] game:achievement", payload);
    handlers.onAchievement?.(payload.ids ?? []);
  });

  socket.on("game:error", (payload) => {
    console.warn("[client][socket] game:error", payload);
    handlers.onError?.(payload.message);
  });

  socket.on("connect_error", (err) => {
    console.warn("[client][socket] connect_error", err);
    handlers.onError?.(err.message ?? "Connection error");
  });

  socket.on("disconnect", (reason) => {
    console.log("[client][socket] disconnect", reason);
    handlers.onDisconnect(reason);
  });

  socket.on("connect", () => {
    console.log("[client][socket] connected");
    handlers.onConnect?.();
  });

  const move = (direction: Direction) => {
    socket.emit("game:move", { direction });
  };

  return {
    socket,
    move,
    swipe: (velocity) => {
      const direction = resolveSwipe(velocity);
      if (direction) move(direction);
      return direction;
    },
    undo: () => {
      socket.emit("game:undo");
    },
    restart: () => {
      socket.emit("game:restart");
    },
    close: () => {
      socket.disconnect();
    }
  };
}
