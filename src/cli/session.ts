import { env } from '../config/env';
import { getPhase, getWinner, placeMark, renderBoard } from '../services/gameService';
import type { GameState, PlayerMark } from '../types/game';
import { parseCoordinates } from './input';

export interface SessionIO {
  /** Resolves to null once input is closed. */
  readLine(): Promise<string | null>;
  write(line: string): void;
}

export type SessionOutcome = PlayerMark | 'draw' | 'aborted';

export interface SessionResult {
  game: GameState;
  outcome: SessionOutcome;
}

export const MESSAGES = {
  start: 'Starting the game!',
  prompt: (mark: PlayerMark) =>
    `Player ${mark}'s turn. Enter x, y coordinates for your move (0-2, 0-2):`,
  invalidFormat:
    'Invalid input! Please enter the coordinates in the format x, y where both x and y are between 0 and 2.',
  outOfRange: 'Coordinates must be between 0 and 2. Please try again.',
  occupied: 'Invalid move! Spot already taken or out of bounds, please try again.',
  win: (mark: PlayerMark) => `Player ${mark} wins!`,
  draw: "It's a draw!",
};

function printBoard(io: SessionIO, game: GameState) {
  io.write(renderBoard(game.board));
  io.write('');
}

export async function runSession(initial: GameState, io: SessionIO): Promise<SessionResult> {
  let game = initial;
  if (env.debug) console.warn(`[game] session ${game.id} started, ${game.currentTurn} to move`);

  io.write(MESSAGES.start);
  printBoard(io, game);

  while (getPhase(game) === 'in_progress') {
    io.write(MESSAGES.prompt(game.currentTurn));
    const line = await io.readLine();
    if (line === null) {
      if (env.debug) console.warn(`[game] session ${game.id} aborted after ${game.moves.length} moves`);
      return { game, outcome: 'aborted' };
    }

    const coords = parseCoordinates(line);
    if (!coords.ok) {
      io.write(coords.error === 'out_of_range' ? MESSAGES.outOfRange : MESSAGES.invalidFormat);
      continue;
    }

    const result = placeMark(game, coords.row, coords.col);
    if (!result.ok) {
      io.write(result.error === 'out_of_range' ? MESSAGES.outOfRange : MESSAGES.occupied);
      continue;
    }
    game = result.game;
    printBoard(io, game);
  }

  const winner = getWinner(game.board);
  if (winner) {
    io.write(MESSAGES.win(winner));
  } else {
    io.write(MESSAGES.draw);
  }
  if (env.debug) {
    const duration = (game.endedAt ?? Date.now()) - game.startedAt;
    console.warn(`[game] session ${game.id} ended: ${winner ?? 'draw'} after ${duration}ms`);
  }
  return { game, outcome: winner ?? 'draw' };
}
