/**
 * Indicator-driven trade simulation
 *
 * Fetches the indicator series from StockCharts and the stock's daily bars
 * from Stooq, replays the buy/sell rule and writes a JSON report.
 *
 * Usage:
 *   npm run simulate -- -i '$NYSI' -s GGUS.AX -b Black -m 12
 *   npm run simulate -- --align same-day --blacklist-start 2024-03-01 --blacklist-end 2024-03-31
 */

import './load-env';

import { writeFile } from 'node:fs/promises';
import { SIMULATE_USAGE, parseSimulateArgs } from '../src/modules/nysi/cli/simulateArgs';
import type { SimulateArgs } from '../src/modules/nysi/cli/simulateArgs';
import { StockChartsSeriesSource, StooqPriceSource, monthsToLookback } from '../src/modules/nysi/data';
import { simulateTrades } from '../src/modules/nysi/engine';
import { isMonitorError, toError } from '../src/modules/nysi/errors';
import { displaySymbol } from '../src/modules/nysi/notify';
import { SIGNAL_COLOR } from '../src/modules/nysi/types';
import type { IsoDate, SimulatedTrade } from '../src/modules/nysi/types';

function isoDay(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

function monthsBefore(date: Date, months: number): Date {
  const d = new Date(date.getTime());
  d.setUTCMonth(d.getUTCMonth() - months);
  return d;
}

function reportFileName(args: SimulateArgs, now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const safe = (t: string) => displaySymbol(t).replace(/[^A-Za-z0-9_-]/g, '_');
  return `${safe(args.indicator)}_${safe(args.stock)}_${args.months}_trading_sim_${stamp}.json`;
}

function printTrades(trades: SimulatedTrade[]): void {
  if (trades.length === 0) {
    console.log('  No trades');
    return;
  }
  for (const t of trades) {
    const sign = t.returnPct >= 0 ? '+' : '';
    const open = t.open ? ' (open)' : '';
    console.log(
      `  ${t.entryDate} @ ${t.entryPrice} -> ${t.exitDate} @ ${t.exitPrice}: ${sign}${t.returnPct}%${open}`
    );
  }
  const closed = trades.filter((t) => !t.open);
  const wins = closed.filter((t) => t.returnPct > 0).length;
  const total = trades.reduce((sum, t) => sum + t.returnPct, 0);
  console.log(
    `\n  Trades: ${trades.length} (${closed.length} closed, ${wins} winning), summed return ${total.toFixed(2)}%`
  );
}

async function main(): Promise<void> {
  const args = parseSimulateArgs(process.argv.slice(2));
  if (args.help) {
    console.log(SIMULATE_USAGE);
    return;
  }
  for (const warning of args.warnings) {
    console.warn(`⚠️  ${warning}`);
  }

  const now = new Date();
  const end = isoDay(now);
  const start = isoDay(monthsBefore(now, args.months));

  console.log(`📥 Fetching ${args.indicator} (${args.months} months)...`);
  const indicator = await new StockChartsSeriesSource().fetch(args.indicator, monthsToLookback(args.months));
  console.log(`   ${indicator.points.length} points`);

  console.log(`📥 Fetching ${args.stock} ${args.priceType} prices ${start} -> ${end}...`);
  const prices = await new StooqPriceSource().fetchPrices(args.stock, start, end, args.priceType);
  console.log(`   ${prices.length} bars`);

  const result = simulateTrades(indicator, prices, {
    buySignal: args.buySignal,
    alignment: args.alignment,
    blacklist: args.blacklist,
  });
  const trades = [...result.trades];

  console.log(
    `\n📊 ${args.stock} bought on ${SIGNAL_COLOR[args.buySignal]} ${args.indicator} (${args.alignment})`
  );
  console.log(`   Merged rows: ${result.rows.length}, unmatched dates: ${result.unmatchedDates}`);
  if (args.blacklist) {
    console.log(`   Blacklist: ${args.blacklist.start} -> ${args.blacklist.end}`);
  }
  printTrades(trades);

  const report = {
    indicator: args.indicator,
    stock: args.stock,
    months: args.months,
    buySignal: SIGNAL_COLOR[args.buySignal],
    priceType: args.priceType,
    alignment: args.alignment,
    blacklist: args.blacklist ?? null,
    unmatchedDates: result.unmatchedDates,
    rows: result.rows,
    trades,
  };
  const output = args.output ?? reportFileName(args, now);
  await writeFile(output, JSON.stringify(report, null, 2) + '\n', 'utf8');
  console.log(`\n✅ Report written to ${output}`);
}

main().catch((error: unknown) => {
  if (isMonitorError(error) && error.code === 'INVALID_CONFIG') {
    console.error(`❌ ${error.message}\n`);
    console.error(SIMULATE_USAGE);
  } else {
    console.error('❌ Simulation failed:', toError(error).message);
  }
  process.exit(1);
});
