import { resolveLeyningEnv, type LeyningEnvConfig } from '../../config/env';
import { createGoogleClients, openOrCreateSpreadsheet, shareSpreadsheet } from '../../lib/google';
import { createLogger, type Logger } from '../../shared/logger';
import { GoogleSheetSink } from '../sheets/googleSink';
import type { SheetSink } from '../sheets/sink';
import { ConfigError, InvalidArgumentsError, errorMessage } from './errors';
import { writeWorkbook } from './orchestrate';
import { CsvPageNumbers } from './pages';
import { HebcalLeyningSource, type LeyningSource } from './source';
import { IsoDateSchema, type PageNumberLookup } from './types';

export const USAGE = `Usage: leyning <start_date> <end_date> [options]

Fetch Torah reading information from the Hebcal API

Arguments:
  start_date            Start date in YYYY-MM-DD format
  end_date              End date in YYYY-MM-DD format

Options:
  -v, --verbose         Enable verbose output
  -s, --sheet <name>    Google Sheet name (if not provided, will only print JSON)
  -e, --email <email>   Email address to share the sheet with
  -t, --test            Test mode - only process first parsha
  --pages <file>        CSV file with page numbers
  -h, --help            Show this help`;

export interface CliOptions {
  startDate: string;
  endDate: string;
  verbose: boolean;
  sheet?: string;
  email?: string;
  test: boolean;
  pages?: string;
  help: boolean;
}

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) throw new InvalidArgumentsError(`${flag} requires a value`);
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const positional: string[] = [];
  const options: Omit<CliOptions, 'startDate' | 'endDate'> = { verbose: false, test: false, help: false };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    const [flag, inline] = arg.startsWith('--') && arg.includes('=') ? arg.split(/=(.*)/s, 2) : [arg, undefined];
    const value = () => {
      if (inline !== undefined) return inline;
      const next = takeValue(argv, index, flag);
      index += 1;
      return next;
    };

    switch (flag) {
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-t':
      case '--test':
        options.test = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-s':
      case '--sheet':
        options.sheet = value();
        break;
      case '-e':
      case '--email':
        options.email = value();
        break;
      case '--pages':
        options.pages = value();
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') throw new InvalidArgumentsError(`Unknown option: ${arg}`);
        positional.push(arg);
    }
  }

  if (options.help) return { ...options, startDate: '', endDate: '' };
  if (positional.length !== 2) {
    throw new InvalidArgumentsError('Expected exactly two arguments: <start_date> <end_date>');
  }
  const [startDate, endDate] = positional;
  if (!IsoDateSchema.safeParse(startDate).success || !IsoDateSchema.safeParse(endDate).success) {
    throw new InvalidArgumentsError('Dates must be in YYYY-MM-DD format');
  }
  return { ...options, startDate, endDate };
}

export interface OpenedSink {
  sink: SheetSink;
  url: string;
}

export interface CliDeps {
  loadEnv(): LeyningEnvConfig;
  createSource(env: LeyningEnvConfig, logger: Logger): LeyningSource;
  openSink(env: LeyningEnvConfig, sheetName: string, email: string, logger: Logger): Promise<OpenedSink>;
  loadPages(file: string): Promise<PageNumberLookup>;
  stdout(text: string): void;
  stderr(text: string): void;
}

async function openGoogleSink(
  env: LeyningEnvConfig,
  sheetName: string,
  email: string,
  logger: Logger,
): Promise<OpenedSink> {
  const clients = await createGoogleClients(env);
  logger.debug(`Connecting to Google Sheets: ${sheetName}`);
  const workbook = await openOrCreateSpreadsheet(clients, sheetName);
  logger.debug(workbook.created ? 'Created new spreadsheet' : 'Found existing spreadsheet');
  await shareSpreadsheet(clients, workbook.spreadsheetId, email);
  logger.debug(`Shared spreadsheet with ${email}`);
  const sink = new GoogleSheetSink({
    sheets: clients.sheets,
    spreadsheetId: workbook.spreadsheetId,
    delayMs: env.sheetsDelayMs,
    logger,
  });
  return { sink, url: workbook.url };
}

export const defaultDeps: CliDeps = {
  loadEnv: () => resolveLeyningEnv(),
  createSource: (env, logger) => new HebcalLeyningSource({ baseUrl: env.leyningUrl, logger }),
  openSink: openGoogleSink,
  loadPages: (file) => CsvPageNumbers.fromFile(file),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/** Resolves to the process exit code. */
export async function runCli(argv: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps, ...overrides };

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    deps.stderr(`Error: ${errorMessage(err)}`);
    deps.stderr(USAGE);
    return 1;
  }
  if (options.help) {
    deps.stdout(USAGE);
    return 0;
  }

  const logger = createLogger('cli', { verbose: options.verbose });
  try {
    if (options.sheet && !options.email) throw new ConfigError('--email is required when using --sheet');
    const env = deps.loadEnv();

    const data = await deps.createSource(env, logger).fetch(options.startDate, options.endDate);
    const pages = options.pages ? await deps.loadPages(options.pages) : undefined;

    if (options.verbose || !options.sheet) deps.stdout(JSON.stringify(data, null, 2));
    if (!options.sheet || !options.email) return 0;

    const { sink, url } = await deps.openSink(env, options.sheet, options.email, logger);
    const summary = await writeWorkbook(
      { sink, logger, pages, officiant: env.officiant, testMode: options.test },
      data,
    );
    if (summary.skipped.length) logger.warn(`Skipped: ${summary.skipped.join(', ')}`);
    if (summary.failed.length) logger.warn(`Failed: ${summary.failed.join(', ')}`);
    logger.debug(`Successfully wrote data to ${options.sheet}`);
    deps.stdout(`\nData written to Google Sheet: ${url}`);
    return 0;
  } catch (err) {
    deps.stderr(`Error: ${errorMessage(err)}`);
    if (options.verbose && err instanceof Error && err.cause) deps.stderr(`Caused by: ${errorMessage(err.cause)}`);
    return 1;
  }
}
