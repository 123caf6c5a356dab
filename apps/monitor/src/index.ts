import 'dotenv/config';

import { serve } from '@hono/node-server';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { createApp } from './app';
import { loadConfig } from './config';
import { unixNow, type MonitorDeps } from './deps';
import { readEnv, type Env } from './env';
import { isMonitorError, toErrorMessage } from './errors';
import { sendTestAlert } from './notify/dispatcher';
import { runLoop } from './scheduler/loop';
import { runDailyReport } from './scheduler/report';
import { runScheduledTick } from './scheduler/scheduled';
import { StateStore } from './store/state-store';

type CommonArgs = {
  config?: string;
  db?: string;
};

async function setup(args: CommonArgs): Promise<{ env: Env; deps: MonitorDeps }> {
  const env = readEnv();
  const config = await loadConfig(args.config ?? env.KEEPWATCH_CONFIG, env);
  const store = StateStore.open(args.db ?? env.KEEPWATCH_DB);
  return { env, deps: { config, store } };
}

function reportFault(err: unknown): void {
  const code = isMonitorError(err) ? err.code : 'UNEXPECTED';
  console.error(`keepwatch: monitoring fault code=${code} ${toErrorMessage(err)}`);
  process.exitCode = 1;
}

function onShutdown(handler: () => void): void {
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}

async function checkCommand(args: CommonArgs): Promise<void> {
  const { deps } = await setup(args);
  try {
    const tick = await runScheduledTick(deps, unixNow());
    if (tick.cycle.delivery?.status === 'failed' || tick.report.status === 'failed') {
      process.exitCode = 1;
    }
  } finally {
    deps.store.close();
  }
}

async function runCommand(args: CommonArgs): Promise<void> {
  const { deps } = await setup(args);
  const controller = new AbortController();
  onShutdown(() => {
    console.log('keepwatch: stopping after the current tick');
    controller.abort();
  });

  try {
    await runLoop(deps, {
      intervalSeconds: deps.config.checkIntervalSeconds,
      signal: controller.signal,
    });
  } finally {
    deps.store.close();
  }
}

async function reportCommand(args: CommonArgs & { force: boolean }): Promise<void> {
  const { deps } = await setup(args);
  try {
    const run = await runDailyReport(deps, unixNow(), { force: args.force });
    console.log(`keepwatch: report ${run.status}${run.reset ? ' (window reset)' : ''}`);
    if (run.status === 'failed') process.exitCode = 1;
  } finally {
    deps.store.close();
  }
}

async function testAlertCommand(args: CommonArgs): Promise<void> {
  const { deps } = await setup(args);
  try {
    const delivery = await sendTestAlert(deps, unixNow());
    console.log(`keepwatch: test alert ${delivery.status}`);
    if (delivery.status !== 'sent') process.exitCode = 1;
  } finally {
    deps.store.close();
  }
}

async function serveCommand(args: CommonArgs & { port?: number }): Promise<void> {
  const { env, deps } = await setup(args);
  const app = createApp({ ...deps, cronToken: () => env.KEEPWATCH_CRON_TOKEN });
  const port = args.port ?? env.PORT;

  if (!env.KEEPWATCH_CRON_TOKEN) {
    console.warn('keepwatch: KEEPWATCH_CRON_TOKEN is not set; trigger endpoints are disabled');
  }

  const server = serve({ fetch: app.fetch, port }, (info) => {
    console.log(`keepwatch: listening on http://localhost:${info.port}`);
  });

  await new Promise<void>((resolve) => {
    onShutdown(() => {
      server.close(() => resolve());
    });
  });
  deps.store.close();
}

const cli = yargs(hideBin(process.argv))
  .scriptName('keepwatch')
  .option('config', {
    type: 'string',
    describe: 'JSON configuration file (default: $KEEPWATCH_CONFIG or ./keepwatch.config.json)',
  })
  .option('db', {
    type: 'string',
    describe: 'Path to the SQLite state file (default: $KEEPWATCH_DB or ./data/keepwatch.db)',
  })
  .command(
    'check',
    'Run one check cycle, then the daily report if it is due',
    (y) => y,
    (args) => checkCommand(args).catch(reportFault),
  )
  .command(
    'run',
    'Run check cycles continuously at the configured interval',
    (y) => y,
    (args) => runCommand(args).catch(reportFault),
  )
  .command(
    'report',
    'Produce the daily report if it is due',
    (y) =>
      y.option('force', {
        type: 'boolean',
        default: false,
        describe: 'Send the report now without resetting the window',
      }),
    (args) => reportCommand(args).catch(reportFault),
  )
  .command(
    'test-alert',
    'Send a test notification through the configured channel',
    (y) => y,
    (args) => testAlertCommand(args).catch(reportFault),
  )
  .command(
    'serve',
    'Serve the HTTP trigger endpoints for an external scheduler',
    (y) => y.option('port', { type: 'number', describe: 'Listen port (default: $PORT or 8787)' }),
    (args) => serveCommand(args).catch(reportFault),
  )
  .demandCommand()
  .help()
  .strict();

await cli.parseAsync();
