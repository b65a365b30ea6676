export type PlayerMark = 'X' | 'O';

export type Cell = PlayerMark | null;

export interface Move {
  mark: PlayerMark;
  row: number; // 0..2
  col: number; // 0..2
}

export interface GameState {
  id: string;
  board: Cell[]; // 9 cells, row-major
  currentTurn: PlayerMark;
  moves: Move[];
  startedAt: number;
  endedAt?: number;
}

export type GamePhase = 'in_progress' | 'won' | 'drawn';

export type PlaceError = 'out_of_range' | 'cell_occupied' | 'game_over';

export type PlaceResult =
  | { ok: true; game: GameState }
  | { ok: false; error: PlaceError; game: GameState };
