import { isSpecialDay } from './classify';
import { SinkConflictError, SinkUnavailableError, errorMessage } from './errors';
import { MINYAN_SHEET_TITLE } from './layout';
import { buildMinyanReport } from './minyan';
import { buildParshaReport } from './report';
import type { LeyningItem, PageNumberLookup, ReadingSet, ReportModel } from './types';
import type { Logger } from '../../shared/logger';
import { prepareSheet, renderReport } from '../sheets/render';
import type { SheetInfo, SheetSink } from '../sheets/sink';

/** Everything one run needs, built once by the caller and passed down. */
export interface RunContext {
  sink: SheetSink;
  logger: Logger;
  pages?: PageNumberLookup;
  officiant?: string;
  testMode?: boolean;
}

export interface RunSummary {
  written: string[];
  skipped: string[];
  failed: string[];
}

export interface OccasionGroup {
  name: string;
  items: LeyningItem[];
}

/**
 * Same-named occasions collected in first-seen order. Special days stay out;
 * they only show up on the weekday tab.
 */
export function groupOccasions(items: readonly LeyningItem[]): OccasionGroup[] {
  const groups = new Map<string, LeyningItem[]>();
  for (const item of items) {
    const name = item.name.en;
    if (isSpecialDay(name)) continue;
    const bucket = groups.get(name);
    if (bucket) bucket.push(item);
    else groups.set(name, [item]);
  }
  return [...groups.entries()].map(([name, grouped]) => ({ name, items: grouped }));
}

export function selectRepresentative(group: OccasionGroup): LeyningItem {
  return group.items.find((item) => item.fullkriyah !== undefined) ?? group.items[0];
}

function reportWarnings(logger: Logger, model: ReportModel) {
  if (!logger.verbose) return;
  for (const warning of model.warnings) logger.warn(warning);
}

async function resetMinyanSheet(ctx: RunContext): Promise<SheetInfo> {
  const { sink, logger } = ctx;
  const sheets = await sink.listSheets();
  // reuse an existing Minyan tab wherever it sits; reordering happens at the end
  let minyan = sheets.find((sheet) => sheet.title === MINYAN_SHEET_TITLE) ?? sheets[0];
  if (!minyan) {
    minyan = await sink.createSheet(MINYAN_SHEET_TITLE);
  } else if (minyan.title !== MINYAN_SHEET_TITLE) {
    await sink.renameSheet(minyan.id, MINYAN_SHEET_TITLE);
    minyan = { ...minyan, title: MINYAN_SHEET_TITLE };
  }
  await sink.clearSheet(minyan.id);

  const stale = sheets.filter((sheet) => sheet.id !== minyan.id);
  if (stale.length) logger.debug('Removing old worksheets...');
  for (const sheet of stale) {
    try {
      await sink.deleteSheet(sheet.id);
    } catch (err) {
      logger.warn(`Error deleting worksheet "${sheet.title}": ${errorMessage(err)}`);
    }
  }
  return minyan;
}

/** One retry after dropping a same-named tab; undefined means the occasion is skipped. */
async function createOccasionSheet(ctx: RunContext, name: string): Promise<SheetInfo | undefined> {
  const { sink, logger } = ctx;
  try {
    return await sink.createSheet(name);
  } catch (err) {
    if (!(err instanceof SinkConflictError)) throw err;
    logger.debug(`Sheet ${name} already exists, trying to delete it first`);
  }

  try {
    const existing = (await sink.listSheets()).find((sheet) => sheet.title === name);
    if (existing) await sink.deleteSheet(existing.id);
    return await sink.createSheet(name);
  } catch (err) {
    logger.error(`Error handling duplicate sheet ${name}: ${errorMessage(err)}`);
    return undefined;
  }
}

export async function writeMinyan(ctx: RunContext, sheetId: number, items: readonly LeyningItem[]): Promise<void> {
  ctx.logger.debug('Updating Minyan readings tab...');
  const model = buildMinyanReport(items);
  reportWarnings(ctx.logger, model);
  await prepareSheet(ctx.sink, sheetId);
  if (!model.rows.length) {
    ctx.logger.debug('No readings found');
    return;
  }
  await renderReport(ctx.sink, sheetId, model);
  ctx.logger.debug('Minyan readings tab updated successfully');
}

async function writeOccasion(ctx: RunContext, group: OccasionGroup): Promise<'written' | 'skipped'> {
  const sheet = await createOccasionSheet(ctx, group.name);
  if (!sheet) return 'skipped';
  const model = buildParshaReport(selectRepresentative(group), {
    pages: ctx.pages?.lookup(group.name),
    officiant: ctx.officiant,
  });
  reportWarnings(ctx.logger, model);
  await prepareSheet(ctx.sink, sheet.id);
  await renderReport(ctx.sink, sheet.id, model);
  return 'written';
}

async function moveMinyanFirst(ctx: RunContext, minyanId: number): Promise<void> {
  const sheets = await ctx.sink.listSheets();
  if (!sheets.length || sheets[0].id === minyanId) return;
  await ctx.sink.reorderSheets([minyanId, ...sheets.filter((s) => s.id !== minyanId).map((s) => s.id)]);
}

export async function writeWorkbook(ctx: RunContext, data: ReadingSet): Promise<RunSummary> {
  const { logger } = ctx;
  const summary: RunSummary = { written: [], skipped: [], failed: [] };

  let groups = groupOccasions(data.items);
  if (ctx.testMode && groups.length) {
    groups = groups.slice(0, 1);
    logger.debug(`Test mode: Processing only parsha ${groups[0].name}`);
  }

  const minyan = await resetMinyanSheet(ctx);
  await writeMinyan(ctx, minyan.id, data.items);

  logger.debug('Processing parshas...');
  for (const group of groups) {
    logger.debug(`Processing ${group.name}`);
    try {
      const outcome = await writeOccasion(ctx, group);
      summary[outcome].push(group.name);
    } catch (err) {
      if (err instanceof SinkUnavailableError) throw err;
      logger.error(`Failed to write ${group.name}: ${errorMessage(err)}`);
      summary.failed.push(group.name);
    }
  }

  await moveMinyanFirst(ctx, minyan.id);
  return summary;
}
