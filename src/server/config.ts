import "dotenv/config";

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  corsOrigin: string;
  audioMuted: boolean;
  sessionIdleMs: number;
}

type Env = Record<string, string | undefined>;

function readPort(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  if (!raw || !Number.isInteger(value) || value < 0 || value > 65535) return fallback;
  return value;
}

function readDuration(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  if (!raw || !Number.isInteger(value) || value <= 0) return fallback;
  return value;
}

function readBoolean(raw: string | undefined, fallback: boolean): boolean {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
  if (normalized === "false" || normalized === "0" || normalized === "no") return false;
  return fallback;
}

function readString(raw: string | undefined, fallback: string): string {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: readPort(env.PORT, 4000),
    host: readString(env.HOST, "0.0.0.0"),
    dataDir: readString(env.DATA_DIR, "data"),
    corsOrigin: readString(env.CORS_ORIGIN, "*"),
    // Sound starts muted until the player turns it on.
    audioMuted: readBoolean(env.AUDIO_MUTED, true),
    sessionIdleMs: readDuration(env.SESSION_IDLE_MS, 30 * 60 * 1000)
  };
}
