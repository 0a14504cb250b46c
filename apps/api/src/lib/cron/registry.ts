import type { Command } from './runtime.js';
import { countriesRefresh, countriesReport } from './commands/countries.js';

export const commands: Record<string, Command> = {
  'countries:refresh': countriesRefresh,
  'countries:report': countriesReport,
};
