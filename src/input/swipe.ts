import { SWIPE_VELOCITY_THRESHOLD } from "../shared/constants.js";
import type { Direction } from "../shared/gameTypes.js";

export interface SwipeVelocity {
  vx: number;
  vy: number;
}

// Screen coordinates: positive vy points down.
export function resolveSwipe(
  { vx, vy }: SwipeVelocity,
  threshold = SWIPE_VELOCITY_THRESHOLD
): Direction | undefined {
  if (!Number.isFinite(vx) || !Number.isFinite(vy)) return undefined;
  const horizontal = Math.abs(vx) >= Math.abs(vy);
  const speed = horizontal ? vx : vy;
  if (Math.abs(speed) <= threshold) return undefined;
  if (horizontal) return speed < 0 ? "left" : "right";
  return speed < 0 ? "up" : "down";
}
