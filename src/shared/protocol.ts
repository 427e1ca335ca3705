import type { AudioSettings, SoundCue } from "../audio/SoundManager.js";
import type { Direction, GameSnapshot, MoveResult } from "./gameTypes.js";

export interface GameResponse {
  gameId: string;
  game: GameSnapshot;
}

export interface MoveResponse {
  result: MoveResult;
  achievements: string[];
  game: GameSnapshot;
}

export interface UndoResponse {
  success: boolean;
  error?: string;
  game: GameSnapshot;
}

export interface AudioSettingsRequest {
  muted?: boolean;
  sfxVolume?: number;
  bgmVolume?: number;
}

export interface ServerToClientEvents {
  "game:update": (game: GameSnapshot) => void;
  "game:moved": (result: MoveResult) => void;
  "game:sound": (cue: SoundCue) => void;
  "game:achievement": (payload: { ids: string[] }) => void;
  "game:error": (payload: { message: string }) => void;
}

export interface ClientToServerEvents {
  "game:move": (payload: { direction: Direction }) => void;
  "game:undo": () => void;
  "game:restart": () => void;
}

export type { AudioSettings, SoundCue };
