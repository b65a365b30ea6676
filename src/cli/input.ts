import { z } from 'zod';
import { BOARD_SIZE } from '../services/gameService';

export type CoordinateError = 'invalid_format' | 'out_of_range';

export type CoordinateResult =
  | { ok: true; row: number; col: number }
  | { ok: false; error: CoordinateError };

const coordinateSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform((s) => parseInt(s, 10));

const coordinatesSchema = z.tuple([coordinateSchema, coordinateSchema]);

/** Parses a "row, col" line typed at the prompt. */
export function parseCoordinates(line: string): CoordinateResult {
  const parsed = coordinatesSchema.safeParse(line.trim().split(','));
  if (!parsed.success) return { ok: false, error: 'invalid_format' };

  const [row, col] = parsed.data;
  if (row >= BOARD_SIZE || col >= BOARD_SIZE) return { ok: false, error: 'out_of_range' };
  return { ok: true, row, col };
}
