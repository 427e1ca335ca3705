export const BOARD_SIZE = 4;
export const INITIAL_TILE_COUNT = 2;

// Spawned tile is a 2 below this draw, a 4 otherwise.
export const TWO_TILE_CHANCE = 0.9;

export const SWIPE_VELOCITY_THRESHOLD = 250;

export const MOVE_HISTORY_LIMIT = 50;
export const LOG_LIMIT = 50;

export const DIRECTIONS = ["up", "down", "left", "right"] as const;
