/**
 * Indicator direction monitor
 *
 * Polls each symbol inside the monitoring window, records its direction and
 * emails every change.
 *
 * Usage:
 *   npm run monitor                       # watch $NYSI in the default window
 *   npm run monitor:check                 # one check, exit 0/1
 *   tsx scripts/monitor.ts --symbol '$NYSI,$NYMO' --continuous --interval 300
 *   tsx scripts/monitor.ts --history
 *   tsx scripts/monitor.ts --validate-email
 */

import './load-env';

import { parseMonitorArgs, MONITOR_USAGE } from '../src/modules/nysi/cli/monitorArgs';
import type { MonitorArgs } from '../src/modules/nysi/cli/monitorArgs';
import { loadEmailConfig, loadMonitorConfig } from '../src/modules/nysi/config';
import { JsonFileStateStore, createSignalSource } from '../src/modules/nysi/data';
import { TransitionDetector, formatRule, formatWindow } from '../src/modules/nysi/engine';
import { isMonitorError, toError } from '../src/modules/nysi/errors';
import { SchedulerLoop, runCheck } from '../src/modules/nysi/monitor';
import { createNotifier } from '../src/modules/nysi/notify';
import { SIGNAL_COLOR } from '../src/modules/nysi/types';

async function printHistory(args: MonitorArgs): Promise<number> {
  const store = new JsonFileStateStore(args.config.stateDir);

  for (const ticker of args.config.symbols) {
    const state = await store.load(ticker);
    console.log(`\n📜 ${ticker}`);
    if (!state) {
      console.log('  No stored state');
      continue;
    }
    console.log(`  Current: ${SIGNAL_COLOR[state.lastSignal]} (${state.lastSignal})`);
    console.log(`  Last checked: ${state.lastCheckedDate}`);
    if (state.lastTransitionDate) {
      console.log(`  Last change: ${state.lastTransitionDate}`);
    }
    for (const entry of state.history ?? []) {
      const value = entry.value === undefined ? '' : ` ${entry.value}`;
      console.log(`  ${entry.date}${value} ${SIGNAL_COLOR[entry.signal]}`);
    }
  }
  console.log('');
  return 0;
}

async function validateEmail(): Promise<number> {
  const notifier = createNotifier(loadEmailConfig());
  return (await notifier.verify()) ? 0 : 1;
}

async function monitor(args: MonitorArgs): Promise<number> {
  const { config } = args;
  const store = new JsonFileStateStore(config.stateDir);
  const source = createSignalSource({
    variant: config.source,
    lookbackDays: config.lookbackDays,
    rule: config.rule,
    chartRegion: config.chartRegion,
  });
  const notifier = createNotifier(loadEmailConfig());
  const detector = new TransitionDetector(store);

  console.log('🚀 Starting indicator monitor...');
  console.log(`   Symbols: ${config.symbols.join(', ')}`);
  console.log(`   Source: ${config.source}, rule: ${formatRule(config.rule)}`);
  console.log(`   State dir: ${config.stateDir}`);
  if (args.command === 'watch') {
    console.log(
      `   Window: ${config.window && !args.continuous ? formatWindow(config.window) : 'none (continuous)'}`
    );
    console.log(`   Interval: ${config.intervalSeconds}s`);
  }

  const loop = new SchedulerLoop(
    {
      tickers: config.symbols,
      mode: args.command === 'check' ? 'check' : 'watch',
      intervalMs: config.intervalSeconds * 1000,
      window: config.window,
      timeZone: config.timeZone,
      continuous: args.continuous,
      everyDay: args.everyDay,
      failFast: args.failFast,
    },
    {
      store,
      check: (ticker, today) =>
        runCheck(
          { source, store, detector, notifier, rule: config.rule, awaitFreshData: config.awaitFreshData },
          ticker,
          today
        ),
      onStateChange: (state, previous) => {
        // Checking <-> Waiting repeats every interval
        const polling = (s: string) => s === 'Checking' || s === 'Waiting';
        if (!(polling(state) && polling(previous))) {
          console.log(`🔁 ${previous} -> ${state}`);
        }
      },
    }
  );

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    console.log(`\n🛑 Received ${signal}, stopping after the current check...`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const summary = await loop.run(controller.signal);
  console.log(
    `\n✅ Monitor finished: ${summary.cycles} cycle(s), ${summary.outcomes.length} check(s), ${summary.failures.length} failure(s)`
  );
  return summary.exitCode;
}

async function main(): Promise<number> {
  const args = parseMonitorArgs(process.argv.slice(2), loadMonitorConfig());

  switch (args.command) {
    case 'help':
      console.log(MONITOR_USAGE);
      return 0;
    case 'history':
      return printHistory(args);
    case 'validate-email':
      return validateEmail();
    case 'check':
    case 'watch':
      return monitor(args);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (isMonitorError(error) && error.code === 'INVALID_CONFIG') {
      console.error(`❌ ${error.message}\n`);
      console.error(MONITOR_USAGE);
    } else {
      console.error('❌ Monitor failed:', toError(error).message);
    }
    process.exit(1);
  });
