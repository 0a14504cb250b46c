import { pool } from '@countryfx/db';
import type { AppContext } from '../../context.js';
import { describeError } from '../errors.js';

export type Command = (args: string[], ctx: AppContext) => Promise<void>;

/** Runs one command with timing and outcome logging. Returns the exit code. */
export async function runCommand(
  name: string,
  command: Command,
  args: string[],
  ctx: AppContext
): Promise<number> {
  const log = ctx.logger.child({ command: name });
  const started = Date.now();
  log.info('starting');

  try {
    await command(args, ctx);
    log.info({ durationMs: Date.now() - started }, 'finished');
    return 0;
  } catch (err) {
    log.error({ durationMs: Date.now() - started, err: describeError(err) }, 'failed');
    return 1;
  } finally {
    await ctx.queue.onIdle();
  }
}

export async function closeContext(ctx: AppContext): Promise<void> {
  if (ctx.repository.kind === 'postgres') await pool.end();
}
