#!/usr/bin/env node
import { Command, InvalidOptionArgumentError } from 'commander';
import process from 'node:process';
import ora, { type Ora } from 'ora';
import pc from 'picocolors';

import { loadEnvFilesWithSummary } from '@factiva-analytics/shared-infrastructure';

import {
  Account,
  JOB_STATE_DONE,
  type JobOutcome,
  SDK_VERSION,
  SnapshotExplain,
  SnapshotExtraction,
  SnapshotTimeSeries,
  StreamingInstance,
  createLogger,
} from '../src/index.js';

loadEnvFilesWithSummary({ files: ['.env'], cwd: process.cwd(), assignToProcess: true, override: false });

// Library logs go to stderr so stdout stays clean for --json.
const logger = createLogger({ level: process.env.LOG_LEVEL || 'warn', fd: 2 });

type GlobalFlags = {
  json?: boolean;
};

const parseInteger =
  (label: string, min: number) =>
  (value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed < min) {
      throw new InvalidOptionArgumentError(`${label} must be an integer >= ${min}.`);
    }
    return parsed;
  };

const parseList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

async function withSpinner<T>(label: string, json: boolean, task: () => Promise<T>): Promise<T> {
  const spinner: Ora | null = json || !process.stdout.isTTY ? null : ora({ spinner: 'dots', color: 'cyan' });
  spinner?.start(label);
  try {
    const value = await task();
    spinner?.stop();
    return value;
  } catch (error) {
    spinner?.fail(label);
    throw error;
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function reportFailure<T>(outcome: JobOutcome<T>): void {
  if (outcome.ok) return;
  console.log(pc.red(`✖ Job ${outcome.handle.id} ended in ${outcome.status.state}`));
  for (const err of outcome.status.errors ?? []) {
    console.log(pc.red(`  • ${err.title}: ${err.detail}`));
  }
  process.exitCode = 1;
}

const program = new Command()
  .name('factiva-analytics')
  .description('Run Factiva Analytics snapshot and streaming jobs')
  .version(SDK_VERSION)
  .option('--json', 'Print machine-readable JSON', false);

program
  .command('explain')
  .description('Estimate the number of documents matching a query')
  .argument('[where]', 'Where clause (defaults to FACTIVA_WHERE)')
  .action(async (where: string | undefined, _opts: unknown, command: Command) => {
    const { json = false } = command.optsWithGlobals<GlobalFlags>();
    const explain = new SnapshotExplain({ query: { where }, logger });
    const outcome = await withSpinner('Running explain job', json, () => explain.processJob());

    if (json) {
      printJson({ jobId: outcome.handle.id, state: outcome.status.state, result: outcome.ok ? outcome.result : null });
      return;
    }
    if (!outcome.ok) {
      reportFailure(outcome);
      return;
    }
    console.log(pc.green(`✔ Explain job ${outcome.handle.id} done`));
    console.log(`Estimated volume: ${pc.bold(String(outcome.result.volumeEstimate))}`);
  });

program
  .command('samples')
  .description('Fetch sample documents of a finished explain job')
  .argument('<jobId>', 'Explain job id')
  .option('-n, --num <count>', 'Number of samples (1-100)', parseInteger('Sample count', 1), 10)
  .action(async (jobId: string, opts: { num: number }, command: Command) => {
    const { json = false } = command.optsWithGlobals<GlobalFlags>();
    const explain = new SnapshotExplain({ jobId, logger });
    const samples = await withSpinner('Fetching samples', json, () => explain.getSamples(opts.num));

    if (json) {
      printJson(samples);
      return;
    }
    console.log(pc.green(`✔ ${samples.numSamples} samples`));
    for (const row of samples.rows) {
      console.log(`  • ${pc.gray(String(row.an ?? ''))} ${String(row.title ?? '')}`);
    }
  });

program
  .command('extract')
  .description('Run a snapshot extraction and download its files')
  .argument('[where]', 'Where clause (defaults to FACTIVA_WHERE)')
  .option('--format <format>', 'File format: avro, json or csv', 'avro')
  .option('--limit <n>', 'Maximum number of documents (0 = no limit)', parseInteger('Limit', 0), 0)
  .option('--out <dir>', 'Download directory (defaults to DOWNLOAD_FILES_DIR/<shortId>)')
  .action(
    async (
      where: string | undefined,
      opts: { format: string; limit: number; out?: string },
      command: Command,
    ) => {
      const { json = false } = command.optsWithGlobals<GlobalFlags>();
      const extraction = new SnapshotExtraction({
        query: { where, fileFormat: opts.format, limit: opts.limit },
        logger,
      });
      const outcome = await withSpinner('Running extraction job', json, () => extraction.processJob());
      if (!outcome.ok) {
        if (json) printJson({ jobId: outcome.handle.id, state: outcome.status.state });
        else reportFailure(outcome);
        return;
      }
      const written = await withSpinner('Downloading files', json, () => extraction.downloadFiles(opts.out));

      if (json) {
        printJson({ jobId: outcome.handle.id, shortId: extraction.shortId, files: written });
        return;
      }
      console.log(pc.green(`✔ Extraction ${extraction.shortId ?? outcome.handle.id} done`));
      for (const file of written) console.log(pc.gray(`  • ${file}`));
    },
  );

program
  .command('download')
  .description('Download the files of a finished extraction')
  .argument('<jobId>', 'Full extraction id, or the short id with FACTIVA_USERKEY set')
  .option('--out <dir>', 'Download directory (defaults to DOWNLOAD_FILES_DIR/<shortId>)')
  .action(async (jobId: string, opts: { out?: string }, command: Command) => {
    const { json = false } = command.optsWithGlobals<GlobalFlags>();
    const extraction = new SnapshotExtraction({ jobId, logger });
    const status = await withSpinner('Checking extraction', json, () => extraction.getJobResponse());

    if (status.state !== JOB_STATE_DONE) {
      if (json) printJson({ jobId: extraction.handle?.id, state: status.state });
      else console.log(pc.yellow(`Extraction is ${status.state}; nothing to download yet`));
      process.exitCode = 1;
      return;
    }
    const written = await withSpinner('Downloading files', json, () => extraction.downloadFiles(opts.out));
    if (json) {
      printJson({ jobId: extraction.handle?.id, files: written });
      return;
    }
    console.log(pc.green(`✔ ${written.length} files downloaded`));
    for (const file of written) console.log(pc.gray(`  • ${file}`));
  });

program
  .command('time-series')
  .description('Run a time-series analytics job')
  .argument('[where]', 'Where clause (defaults to FACTIVA_WHERE)')
  .option('--frequency <period>', 'DAY, MONTH or YEAR', 'MONTH')
  .option('--date-field <field>', 'Date field to aggregate on', 'publication_datetime')
  .option('--group-dimensions <fields>', 'Comma-separated list of up to 4 fields', parseList, [])
  .option('--top <n>', 'Top values per dimension', parseInteger('Top', 0), 10)
  .action(
    async (
      where: string | undefined,
      opts: { frequency: string; dateField: string; groupDimensions: string[]; top: number },
      command: Command,
    ) => {
      const { json = false } = command.optsWithGlobals<GlobalFlags>();
      const timeSeries = new SnapshotTimeSeries({
        query: {
          where,
          frequency: opts.frequency,
          dateField: opts.dateField,
          groupDimensions: opts.groupDimensions,
          top: opts.top,
        },
        logger,
      });
      const outcome = await withSpinner('Running time-series job', json, () => timeSeries.processJob());

      if (json) {
        printJson({ jobId: outcome.handle.id, state: outcome.status.state, rows: outcome.ok ? outcome.result.rows : [] });
        return;
      }
      if (!outcome.ok) {
        reportFailure(outcome);
        return;
      }
      console.log(pc.green(`✔ Time-series job ${outcome.handle.id} done (${outcome.result.rows.length} rows)`));
      if (outcome.result.rows.length > 0) console.table(outcome.result.rows);
    },
  );

const stream = program.command('stream').description('Manage streaming instances');

stream
  .command('create')
  .description('Create a streaming instance and wait until it is running')
  .argument('[where]', 'Where clause (defaults to FACTIVA_WHERE)')
  .action(async (where: string | undefined, _opts: unknown, command: Command) => {
    const { json = false } = command.optsWithGlobals<GlobalFlags>();
    const instance = new StreamingInstance({ query: { where }, logger });
    await withSpinner('Creating streaming instance', json, () => instance.create());

    if (json) {
      printJson({ id: instance.id, shortId: instance.shortId, subscriptions: instance.subscriptions });
      return;
    }
    console.log(pc.green(`✔ Streaming instance ${instance.shortId ?? ''} running`));
    for (const sub of instance.subscriptions) console.log(pc.gray(`  • ${sub.id}`));
  });

stream
  .command('status')
  .description('Show the status of a streaming instance')
  .argument('<id>', 'Full stream id, or the short id with FACTIVA_USERKEY set')
  .action(async (id: string, _opts: unknown, command: Command) => {
    const { json = false } = command.optsWithGlobals<GlobalFlags>();
    const instance = new StreamingInstance({ jobId: id, logger });
    const status = await withSpinner('Fetching stream status', json, () => instance.getStatus());

    if (json) {
      printJson({ id: instance.id, state: status.state, subscriptions: instance.subscriptions, errors: status.errors ?? [] });
      return;
    }
    console.log(`${pc.bold(instance.shortId ?? id)}: ${status.state}`);
    for (const sub of instance.subscriptions) console.log(pc.gray(`  • ${sub.id}`));
  });

const account = program.command('account').description('Inspect the account behind FACTIVA_USERKEY');

account
  .command('stats')
  .description('Show account limits and usage')
  .action(async (_opts: unknown, command: Command) => {
    const { json = false } = command.optsWithGlobals<GlobalFlags>();
    const stats = await withSpinner('Fetching account stats', json, () => new Account({ logger }).getStats());

    if (json) {
      printJson(stats);
      return;
    }
    console.log(pc.bold(stats.accountName), pc.gray(`(${stats.accountType})`));
    console.log(`Extractions: ${stats.totalExtractions}/${stats.maxAllowedExtractions} (${stats.remainingExtractions} left)`);
    console.log(
      `Documents:   ${stats.totalExtractedDocuments}/${stats.maxAllowedExtractedDocuments} (${stats.remainingDocuments} left)`,
    );
    console.log(`Streams:     ${stats.totalStreamInstances} instances, ${stats.totalStreamSubscriptions} subscriptions`);
  });

account
  .command('extractions')
  .description('List the extractions of the account')
  .option('--updates', 'Include update operations', false)
  .action(async (opts: { updates: boolean }, command: Command) => {
    const { json = false } = command.optsWithGlobals<GlobalFlags>();
    const listings = await withSpinner('Listing extractions', json, () =>
      new Account({ logger }).listExtractions({ includeUpdates: opts.updates }),
    );

    if (json) {
      printJson(listings);
      return;
    }
    console.table(
      listings.map(({ shortId, updateId, state, format, extractionType }) => ({
        shortId,
        updateId,
        state,
        format,
        extractionType,
      })),
    );
  });

account
  .command('streams')
  .description('List the streams of the account')
  .option('--all', 'Include cancelled and failed streams', false)
  .action(async (opts: { all: boolean }, command: Command) => {
    const { json = false } = command.optsWithGlobals<GlobalFlags>();
    const listings = await withSpinner('Listing streams', json, () =>
      new Account({ logger }).listStreams({ runningOnly: !opts.all }),
    );

    if (json) {
      printJson(listings);
      return;
    }
    console.table(
      listings.map(({ shortId, streamType, state, subscriptions }) => ({
        shortId,
        streamType,
        state,
        subscriptions: subscriptions.map((sub) => sub.shortId).join(','),
      })),
    );
  });

program.parseAsync().catch((error) => {
  console.error(pc.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
