import { parseArgs } from 'node:util';
import demo from '../src/commands/demo';
import { logger } from '../src/logger';

async function run(positionals: string[]) {
  switch (positionals[0]) {
    case 'demo':
      await demo();
      break;
    default:
      console.log('unknown command');
      process.exitCode = 1;
      break;
  }
}

const { positionals } = parseArgs({
  allowPositionals: true,
});

run(positionals).catch((err) => {
  logger.error({ err }, 'command failed');
  process.exit(1);
});
