import { createCanvas, GlobalFonts, loadImage, type SKRSContext2D } from '@napi-rs/canvas';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { describeError, ReportError } from '../../../../lib/errors.js';
import { httpRequest } from '../../../../lib/http.js';
import { logger as defaultLogger, type Logger } from '../../../../lib/logger.js';
import { reportOutcomes } from '../../../../lib/metrics.js';
import type { CountryRepository } from '../../repository/index.js';
import {
  formatEntryLine,
  formatReportTimestamp,
  toRasterFlagUrl,
  type SummaryEntry,
} from './format.js';
import type { ReportGuard } from './report-guard.js';

export const REPORT_WIDTH = 800;
export const REPORT_HEIGHT = 600;
export const TOP_N = 5;

const FLAG_WIDTH = 40;
const FLAG_HEIGHT = 30;
const REPORT_FONT_ALIAS = 'CountryfxReport';

export type FlagLoader = (url: string) => Promise<Buffer>;

export const fetchFlag: FlagLoader = async (url) => {
  return httpRequest(url, { timeoutMs: 10_000 }, async (res) => {
    if (!res.ok) throw new Error(`Failed to fetch flag: HTTP ${res.status}`);
    return Buffer.from(await res.arrayBuffer());
  });
};

const registeredFonts = new Map<string, boolean>();

function resolveFontFamily(fontPath: string | null | undefined, log: Logger): string {
  if (!fontPath) return 'sans-serif';
  let ok = registeredFonts.get(fontPath);
  if (ok === undefined) {
    try {
      ok = GlobalFonts.registerFromPath(fontPath, REPORT_FONT_ALIAS);
    } catch (err) {
      log.warn({ fontPath, err: describeError(err) }, 'report font not loaded');
      ok = false;
    }
    registeredFonts.set(fontPath, ok);
  }
  return ok ? `${REPORT_FONT_ALIAS}, sans-serif` : 'sans-serif';
}

export type RenderOptions = {
  fontPath?: string | null;
  loadFlag?: FlagLoader;
  logger?: Logger;
};

export type SummaryImageInput = {
  total: number;
  top: SummaryEntry[];
  asOf: Date;
};

async function drawFlag(
  ctx: SKRSContext2D,
  entry: SummaryEntry,
  y: number,
  loadFlag: FlagLoader,
  log: Logger
): Promise<void> {
  if (!entry.flagUrl) return;
  const url = toRasterFlagUrl(entry.flagUrl);
  try {
    const image = await loadImage(await loadFlag(url));
    ctx.drawImage(image, 50, y, FLAG_WIDTH, FLAG_HEIGHT);
  } catch (err) {
    log.warn({ country: entry.name, url, err: describeError(err) }, 'flag thumbnail skipped');
  }
}

/** Renders the 800×600 summary card and returns PNG bytes. */
export async function renderSummaryImage(
  input: SummaryImageInput,
  opts: RenderOptions = {}
): Promise<Buffer> {
  const log = opts.logger ?? defaultLogger;
  const loadFlag = opts.loadFlag ?? fetchFlag;
  const family = resolveFontFamily(opts.fontPath, log);

  const canvas = createCanvas(REPORT_WIDTH, REPORT_HEIGHT);
  const ctx = canvas.getContext('2d');

  ctx.fillStyle = '#000000';
  ctx.fillRect(0, 0, REPORT_WIDTH, REPORT_HEIGHT);
  ctx.fillStyle = '#ffffff';
  ctx.textBaseline = 'top';

  const title = 'Country Data Summary';
  ctx.font = `40px ${family}`;
  const titleWidth = ctx.measureText(title).width;
  ctx.fillText(title, Math.floor((REPORT_WIDTH - titleWidth) / 2), 30);

  ctx.font = `24px ${family}`;
  ctx.fillText(`Total Countries: ${input.total}`, 30, 100);
  ctx.fillText('Top 5 by GDP:', 30, 150);

  for (const [i, entry] of input.top.slice(0, TOP_N).entries()) {
    const y = 200 + i * 60;
    await drawFlag(ctx, entry, y, loadFlag, log);
    ctx.fillText(formatEntryLine(i + 1, entry), 100, y + 5);
  }

  ctx.fillText(`Last Updated: ${formatReportTimestamp(input.asOf)}`, 30, 520);

  return canvas.encode('png');
}

export type GenerateReportOptions = RenderOptions & {
  repository: CountryRepository;
  asOf: Date;
  outputPath: string;
  guard?: ReportGuard;
};

export type SummaryReport = {
  status: 'written' | 'skipped';
  path: string;
  total: number;
  top: SummaryEntry[];
};

/**
 * Queries the store, renders the card and overwrites `outputPath`. The write
 * is not atomic: a reader racing it can observe a partial file.
 */
export async function generateSummaryReport(opts: GenerateReportOptions): Promise<SummaryReport> {
  const log = opts.logger ?? defaultLogger;

  let total: number;
  let top: SummaryEntry[];
  try {
    total = await opts.repository.count();
    const rows = await opts.repository.filter({ sort: 'gdp_desc', limit: TOP_N });
    top = rows.map((row) => ({
      name: row.name,
      estimatedGdp: row.estimatedGdp,
      flagUrl: row.flagUrl,
    }));
  } catch (err) {
    reportOutcomes.inc({ outcome: 'failed' });
    throw new ReportError(`Report query failed: ${describeError(err)}`, { cause: err });
  }

  let png: Buffer;
  try {
    png = await renderSummaryImage({ total, top, asOf: opts.asOf }, opts);
  } catch (err) {
    reportOutcomes.inc({ outcome: 'failed' });
    throw new ReportError(`Report rendering failed: ${describeError(err)}`, { cause: err });
  }

  if (opts.guard && !opts.guard.claim(opts.asOf)) {
    reportOutcomes.inc({ outcome: 'skipped' });
    log.info({ asOf: opts.asOf.toISOString() }, 'summary image skipped, newer cycle already wrote');
    return { status: 'skipped', path: opts.outputPath, total, top };
  }

  try {
    await mkdir(dirname(opts.outputPath), { recursive: true });
    await writeFile(opts.outputPath, png);
  } catch (err) {
    reportOutcomes.inc({ outcome: 'failed' });
    throw new ReportError(`Report write failed: ${describeError(err)}`, { cause: err });
  }

  reportOutcomes.inc({ outcome: 'written' });
  log.info({ path: opts.outputPath, total }, 'summary image generated');
  return { status: 'written', path: opts.outputPath, total, top };
}
