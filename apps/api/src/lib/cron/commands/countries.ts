import type { Command } from '../runtime.js';

/** Full cycle: fetch both sources, persist, render the summary. Waits for the outcome. */
export const countriesRefresh: Command = async (_args, ctx) => {
  const ticket = await ctx.orchestrator.trigger();
  const outcome = await ticket.completion;

  if (outcome.status === 'failed') {
    throw new Error(`refresh ${ticket.cycleId} failed during ${outcome.stage}: ${outcome.error.message}`);
  }

  ctx.logger.info(
    {
      cycleId: outcome.cycleId,
      affected: outcome.persisted.affected,
      records: outcome.persisted.records,
      report: outcome.report,
    },
    'countries refreshed'
  );
};

/** Re-renders the summary image from stored data. */
export const countriesReport: Command = async (_args, ctx) => {
  const report = await ctx.orchestrator.regenerateReport();
  ctx.logger.info({ status: report.status, path: report.path, total: report.total }, 'report done');
};
