import 'dotenv/config';
import { createAppContext } from '../../context.js';
import { validateApiRuntimeEnv } from '../env.js';
import { logger } from '../logger.js';
import { commands } from './registry.js';
import { closeContext, runCommand } from './runtime.js';

async function main(): Promise<number> {
  const [cmd = '', ...args] = process.argv.slice(2);
  const command = commands[cmd];

  if (!command) {
    logger.error({ available: Object.keys(commands) }, `Unknown command: ${cmd}`);
    return 1;
  }

  const ctx = createAppContext(validateApiRuntimeEnv());
  try {
    return await runCommand(cmd, command, args, ctx);
  } finally {
    await closeContext(ctx);
  }
}

main().then(
  (code) => process.exit(code),
  (err) => {
    logger.fatal({ err }, 'cron runner crashed');
    process.exit(1);
  }
);
