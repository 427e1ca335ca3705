// Game rules facade: the session layer and the server both import from here.

export type { ActionResult, GameState } from "../server/types.js";

export {
  createInitialGameState,
  startNewGame,
  restoreGameState,
  applyMove,
  undoMove,
  resetBestScore,
  toSavedGame,
  toPublicGameState,
  addLogEntry
} from "../server/gameState.js";
