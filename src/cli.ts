#!/usr/bin/env node
/**
 * datmatch command-line interface
 */

import { constants, realpathSync } from 'node:fs';
import { copyFile, mkdir } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { Command, Option } from 'commander';
import { CatalogStore } from './catalog-store.js';
import { loadConfig } from './config.js';
import { toErrorMessage } from './errors.js';
import type { DatmatchConfig } from './config.js';
import { RomIdentifier } from './identifier.js';
import { createLogger, LOG_LEVELS } from './logging.js';
import type { Logger, LogLevel } from './logging.js';
import { RomRenamer } from './renamer.js';
import { createFileSink, formatPercent, REPORT_FORMATS } from './report.js';
import type { ReportFormat } from './types.js';

export interface CliIO {
  out(line: string): void;
  setExitCode(code: number): void;

  /** Defaults to JSON lines on stderr at the configured level */
  createLogger?(level: LogLevel): Logger;
}

type GlobalOptions = {
  databaseDir?: string;
  logLevel?: LogLevel;
  settings?: string;
};

interface ScanOptions {
  path: string;
  recursive?: boolean;
  output?: string;
}

interface RenameOptions extends ScanOptions {
  dryRun?: boolean;
  backup?: boolean;
}

interface ReportOptions {
  path: string;
  recursive?: boolean;
  output: string;
  format: ReportFormat;
}

interface DbOptions {
  add?: string;
  list?: boolean;
  stats?: boolean;
  find?: string;
}

interface Context {
  config: DatmatchConfig;
  store: CatalogStore;
  identifier: RomIdentifier;
  renamer: RomRenamer;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function stderrLogger(level: LogLevel): Logger {
  return createLogger({
    level,
    write: (entry) => process.stderr.write(`${JSON.stringify(entry)}\n`),
  });
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('datmatch')
    .description('Identify ROM files against DAT checksum catalogs and rename them')
    .option('--database-dir <dir>', 'directory of DAT files to load')
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS))
    .option('--settings <file>', 'JSON settings file');

  async function setup(): Promise<Context> {
    const globals = program.opts<GlobalOptions>();
    const config = await loadConfig({ settingsPath: globals.settings });
    if (globals.databaseDir) config.databaseDir = resolve(globals.databaseDir);
    if (globals.logLevel) config.logLevel = globals.logLevel;

    const logger = (io.createLogger ?? stderrLogger)(config.logLevel);
    const store = new CatalogStore({ databaseDir: config.databaseDir, logger });
    const identifier = new RomIdentifier(store, { logger });
    const renamer = new RomRenamer(identifier, { logger });

    const count = await store.loadAllFromDirectory();
    logger.info('cli', 'Loaded DAT files', { count });

    return { config, store, identifier, renamer };
  }

  program
    .command('scan')
    .description('Scan ROMs for identification')
    .requiredOption('-p, --path <dir>', 'path to ROMs directory')
    .option('-r, --recursive', 'scan recursively')
    .option('--no-recursive', 'stay in the top directory')
    .option('-o, --output <file>', 'output file for report')
    .action(async (options: ScanOptions) => {
      const { config, identifier } = await setup();
      const results = await identifier.identifyDirectory(options.path, options.recursive ?? config.recursive);
      const sink = options.output ? createFileSink(options.output, config.reportFormat) : undefined;
      const report = await identifier.generateReport(results, sink);

      io.out(`Scanned ${report.total} ROMs`);
      io.out(`Identified ${report.identified} ROMs (${formatPercent(report.identificationRate)})`);
      io.out(`Correct names: ${report.correct} (${formatPercent(report.correctNameRate)})`);
    });

  program
    .command('rename')
    .description('Rename ROMs based on identification')
    .requiredOption('-p, --path <dir>', 'path to ROMs directory')
    .option('-r, --recursive', 'scan recursively')
    .option('--no-recursive', 'stay in the top directory')
    .option('-d, --dry-run', "dry run (don't actually rename files)")
    .option('-b, --backup', 'backup ROMs before renaming')
    .option('-o, --output <file>', 'output file for report')
    .action(async (options: RenameOptions) => {
      const { config, renamer } = await setup();
      const dryRun = options.dryRun ?? false;

      if (options.backup) {
        const backupDir = `${options.path}_backup`;
        io.out(`Backing up ROMs to ${backupDir}...`);
        if (!(await renamer.backup(options.path, backupDir))) {
          io.out('Backup failed, not renaming');
          io.setExitCode(1);
          return;
        }
      }

      const results = await renamer.renameDirectory(options.path, options.recursive ?? config.recursive, dryRun);
      const sink = options.output ? createFileSink(options.output, config.reportFormat) : undefined;
      const report = await renamer.generateReport(results, sink);

      io.out(`Scanned ${report.total} ROMs`);
      io.out(`Identified ${report.identified} ROMs (${formatPercent(report.identificationRate)})`);
      io.out(`${dryRun ? 'Would rename' : 'Renamed'} ${report.renamed} ROMs`);
      io.out(`Already correct: ${report.alreadyCorrect} ROMs`);
    });

  program
    .command('report')
    .description('Generate a report from ROMs')
    .requiredOption('-p, --path <dir>', 'path to ROMs directory')
    .option('-r, --recursive', 'scan recursively')
    .option('--no-recursive', 'stay in the top directory')
    .requiredOption('-o, --output <file>', 'output file for report')
    .addOption(new Option('-f, --format <format>', 'report format').choices(REPORT_FORMATS).default('json'))
    .action(async (options: ReportOptions) => {
      const { config, identifier } = await setup();
      const results = await identifier.identifyDirectory(options.path, options.recursive ?? config.recursive);
      await createFileSink(options.output, options.format).write(await identifier.generateReport(results));

      io.out(`${options.format.toUpperCase()} report saved to ${options.output}`);
    });

  program
    .command('db')
    .description('Database management')
    .option('-a, --add <dat>', 'add a DAT file to the database')
    .option('-l, --list', 'list loaded databases')
    .option('-s, --stats', 'show database statistics')
    .option('-f, --find <name>', 'search entries by name')
    .action(async (options: DbOptions) => {
      const { config, store } = await setup();

      if (options.add) {
        if (!(await store.loadSource(options.add))) {
          io.out(`Failed to add DAT file: ${options.add}`);
          io.setExitCode(1);
          return;
        }

        const target = join(config.databaseDir, basename(options.add));
        if (resolve(options.add) !== target) {
          await mkdir(dirname(target), { recursive: true });
          try {
            await copyFile(options.add, target, constants.COPYFILE_EXCL);
          } catch (error) {
            io.out(`Cannot copy DAT file to ${target}: ${toErrorMessage(error)}`);
            io.setExitCode(1);
            return;
          }
        }
        io.out(`Added DAT file: ${options.add}`);
      } else if (options.list) {
        io.out('Loaded databases:');
        for (const name of store.listCatalogs()) {
          io.out(`- ${name}`);
        }
      } else if (options.stats) {
        const stats = store.exportStats();
        io.out(`Total databases: ${stats.catalogCount}`);
        io.out(`Total ROMs: ${stats.totalEntries}`);
        io.out('');
        io.out('Database details:');
        for (const [name, catalog] of Object.entries(stats.perCatalog)) {
          io.out(`- ${name}: ${catalog.entries} ROMs`);
        }
      } else if (options.find) {
        const matches = store.findByName(options.find);
        io.out(`Found ${matches.length} matches for "${options.find}"`);
        for (const match of matches) {
          io.out(`- ${match.entry.name} [${match.catalog}] (${formatPercent(match.confidence)})`);
        }
      } else {
        program.commands.find((command) => command.name() === 'db')?.outputHelp();
      }
    });

  return program;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
