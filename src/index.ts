#!/usr/bin/env node
import { createInterface, type Interface } from 'readline';
import { parseCliArgs, USAGE, VERSION } from './cli/args';
import { runSession, type SessionIO } from './cli/session';
import { createGame } from './services/gameService';

function createTerminalIO(rl: Interface): SessionIO {
  const lines = rl[Symbol.asyncIterator]();
  return {
    async readLine() {
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    write(line) {
      process.stdout.write(line + '\n');
    },
  };
}

async function start() {
  const command = parseCliArgs(process.argv.slice(2));
  switch (command.kind) {
    case 'help':
      console.log(USAGE);
      return;
    case 'version':
      console.log(VERSION);
      return;
    case 'error':
      console.error(`[cli] ${command.message}`);
      console.error(USAGE);
      process.exitCode = 2;
      return;
  }

  const rl = createInterface({ input: process.stdin, terminal: false });
  try {
    await runSession(createGame(command.startPlayer), createTerminalIO(rl));
  } finally {
    rl.close();
  }
}

start().catch((err) => {
  console.error('[cli] unexpected error', err);
  process.exitCode = 1;
});
