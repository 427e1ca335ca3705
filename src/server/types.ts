import type { GameSnapshot, UndoSnapshot } from "../shared/gameTypes.js";

export interface GameState extends Omit<GameSnapshot, "canUndo"> {
  undo?: UndoSnapshot;
}

export interface ActionResult {
  success: boolean;
  error?: string;
}
