import { parseArgs } from 'util';
import { env } from '../config/env';
import { DEFAULT_MARK, parseMark } from '../services/gameService';
import type { PlayerMark } from '../types/game';

export const VERSION = '0.1.0';

export const USAGE = [
  'Tic-Tac-Toe Command Line Game',
  '',
  'Usage: tictactoe [options]',
  '',
  'Options:',
  '  -s, --start-player <X|O>  Player to start the game, X or O (default: X)',
  '  -h, --help                Print help',
  '  -V, --version             Print version',
].join('\n');

export type CliCommand =
  | { kind: 'play'; startPlayer: PlayerMark }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseCliArgs(argv: string[], defaultStart: string = env.startPlayer): CliCommand {
  let values: { 'start-player'?: string; help?: boolean; version?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        'start-player': { type: 'string', short: 's' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'V' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    return { kind: 'error', message: err instanceof Error ? err.message : String(err) };
  }

  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  const raw = values['start-player'] ?? defaultStart;
  const startPlayer = parseMark(raw);
  if (!startPlayer) {
    console.warn(`[config] unrecognized start player '${raw}', falling back to ${DEFAULT_MARK}`);
    return { kind: 'play', startPlayer: DEFAULT_MARK };
  }
  return { kind: 'play', startPlayer };
}
