/**
 * Command-line interface: store maintenance and offline snapshot processing
 */

import { readFile } from 'fs/promises';
import { loadConfigSafe } from './config/index.js';
import { groupByMonth } from './core/date-registry.js';
import { ScrapeResultSchema, formatIssues } from './core/snapshot.js';
import { createTracker } from './core/tracker.js';
import { createLogger } from './utils/logger.js';

export const USAGE = `Usage: court-slot-tracker <command> [--config=PATH]

Commands:
  init                   Create empty store files if they do not exist
  status                 Show tracked slot rows and known dates
  prune                  Drop slot history older than the retention horizon
  process --input=FILE   Process a scrape result (JSON) and print the change report`;

const COMMANDS = ['init', 'status', 'prune', 'process'] as const;
type Command = (typeof COMMANDS)[number];

/**
 * Output sinks (console by default)
 */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function flagValue(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

/**
 * Run a command; resolves to the process exit code
 */
export async function runCli(
  args: string[],
  io: CliIO = consoleIO,
  now?: () => Date
): Promise<number> {
  const command = args.find((a) => !a.startsWith('--'));
  if (!command || !isCommand(command)) {
    io.stderr(USAGE);
    return 2;
  }

  const { config, error } = await loadConfigSafe(flagValue(args, 'config'));
  if (error || !config) {
    io.stderr(`Configuration error:\n${error}`);
    return 1;
  }

  const logger = createLogger(config.logging.level, config.logging.file);
  const tracker = createTracker(config, logger, now);

  switch (command) {
    case 'init': {
      tracker.stateStore.load();
      tracker.dateRegistry.load();
      io.stdout(`State file: ${tracker.stateStore.path}`);
      io.stdout(`Dates file: ${tracker.dateRegistry.path}`);
      return 0;
    }

    case 'status': {
      const state = tracker.stateStore.load();
      const dates = tracker.dateRegistry.list();
      io.stdout(`Tracked slot rows: ${state.size}`);
      io.stdout(`Known dates: ${dates.length}`);
      for (const [month, monthDates] of Object.entries(groupByMonth(dates))) {
        io.stdout(`  ${month}: ${monthDates.join(', ')}`);
      }
      return 0;
    }

    case 'prune': {
      const { removed, persisted } = tracker.prune();
      io.stdout(`Pruned ${removed} slot row(s) dated before ${tracker.horizonDate()}`);
      return persisted ? 0 : 1;
    }

    case 'process': {
      const inputPath = flagValue(args, 'input');
      if (!inputPath) {
        io.stderr('Missing --input=FILE');
        return 2;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(await readFile(inputPath, 'utf-8'));
      } catch (err) {
        io.stderr(`Cannot read ${inputPath}: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
      }

      const parsed = ScrapeResultSchema.safeParse(raw);
      if (!parsed.success) {
        io.stderr(`Invalid scrape result in ${inputPath}:\n${formatIssues(parsed.error)}`);
        return 1;
      }

      const report = tracker.process(parsed.data.snapshot, parsed.data.bookableDates);
      io.stdout(JSON.stringify(report, null, 2));
      return 0;
    }
  }
}
