import type { Cell, GamePhase, GameState, PlaceResult, PlayerMark } from '../types/game';
import { v4 as uuid } from 'uuid';

export const BOARD_SIZE = 3;
export const DEFAULT_MARK: PlayerMark = 'X';

const WIN_LINES = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

export function parseMark(value: unknown): PlayerMark | null {
  if (value === 'X' || value === 'O') return value;
  return null;
}

export function toggleMark(mark: PlayerMark): PlayerMark {
  return mark === 'X' ? 'O' : 'X';
}

/**
 * Starts a new game with an empty board.
 *
 * Any designator other than X or O (including none at all) starts the game
 * with X instead of failing.
 */
export function createGame(startingMark?: unknown): GameState {
  return {
    id: uuid(),
    board: Array<Cell>(BOARD_SIZE * BOARD_SIZE).fill(null),
    currentTurn: parseMark(startingMark) ?? DEFAULT_MARK,
    moves: [],
    startedAt: Date.now(),
  };
}

function inRange(n: number) {
  return Number.isInteger(n) && n >= 0 && n < BOARD_SIZE;
}

function cellIndex(row: number, col: number) {
  return row * BOARD_SIZE + col;
}

export function getCell(board: Cell[], row: number, col: number): Cell | undefined {
  if (!inRange(row) || !inRange(col)) return undefined;
  return board[cellIndex(row, col)];
}

export function getWinner(board: Cell[]): PlayerMark | null {
  for (const [a, b, c] of WIN_LINES) {
    const first = board[a];
    if (first && first === board[b] && first === board[c]) {
      return first;
    }
  }
  return null;
}

export function isBoardFull(board: Cell[]): boolean {
  return board.every((c) => c !== null);
}

export function getPhase(game: GameState): GamePhase {
  if (getWinner(game.board)) return 'won';
  if (isBoardFull(game.board)) return 'drawn';
  return 'in_progress';
}

/**
 * Places the active mark at (row, col). Never throws: rejected moves come
 * back as `{ ok: false }` with the untouched state.
 */
export function placeMark(game: GameState, row: number, col: number): PlaceResult {
  if (!inRange(row) || !inRange(col)) return { ok: false, error: 'out_of_range', game };
  if (getPhase(game) !== 'in_progress') return { ok: false, error: 'game_over', game };

  const index = cellIndex(row, col);
  if (game.board[index] !== null) return { ok: false, error: 'cell_occupied', game };

  const mark = game.currentTurn;
  const board = game.board.slice();
  board[index] = mark;
  const moves = game.moves.concat({ mark, row, col });

  const next: GameState = {
    ...game,
    board,
    moves,
    currentTurn: toggleMark(mark),
  };
  if (getPhase(next) !== 'in_progress') {
    next.endedAt = Date.now();
  }
  return { ok: true, game: next };
}

export function renderBoard(board: Cell[]): string {
  const lines: string[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    const cells = board.slice(row * BOARD_SIZE, (row + 1) * BOARD_SIZE).map((c) => c ?? ' ');
    lines.push(cells.join(' | '));
  }
  return lines.join('\n');
}
