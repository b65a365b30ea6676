import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Raw designator; resolved (with fallback to X) by the CLI
  startPlayer: process.env.TTT_START_PLAYER || 'X',
  debug: process.env.TTT_DEBUG === '1',
};
