/**
 * Argument parsing for scripts/monitor.ts
 *
 * Flags override the environment configuration. Invalid input throws
 * MonitorError INVALID_CONFIG; the script prints it with the usage text.
 */

import type { MonitorConfig } from '../config';
import { parseList } from '../config';
import { parseSignalRule } from '../engine/classifySignal';
import { assertTimeZone, parseWindow } from '../engine/monitoringWindow';
import { MonitorError } from '../errors';

export type MonitorCommand = 'watch' | 'check' | 'history' | 'validate-email' | 'help';

export interface MonitorArgs {
  command: MonitorCommand;
  config: MonitorConfig;
  continuous: boolean;
  everyDay: boolean;
  failFast: boolean;
}

export const MONITOR_USAGE = `Usage: tsx scripts/monitor.ts [options]

Watch a market indicator for direction changes and email each change.

Options:
  --symbol <T>           Symbol to monitor; repeatable or comma-separated (default: $NYSI)
  --check                Run one check for every symbol and exit (0 ok, 1 on failure)
  --interval <seconds>   Polling interval inside the window (default: 30)
  --window <HH:MM-HH:MM> Daily monitoring window (default: 09:30-10:30)
  --timezone <IANA>      Timezone of the window and of "today" (default: Australia/Sydney)
  --continuous           Ignore the window and poll at the interval around the clock
  --once                 Stop after the first day every symbol is checked
  --fail-fast            Exit with code 1 on the first fetch error
  --source <kind>        series (default) or image (legacy chart pixel analysis)
  --rule <rule>          last-change (default) or lookback:N
  --state-dir <dir>      Directory for per-symbol state files (default: data/state)
  --history              Print the stored signal history and exit
  --validate-email       Verify SMTP credentials and exit
  --help                 Show this message
`;

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new MonitorError(`Missing value for ${flag}`, 'INVALID_CONFIG');
  }
  return value;
}

function setCommand(current: MonitorCommand, next: MonitorCommand): MonitorCommand {
  if (current !== 'watch' && current !== next && current !== 'help') {
    throw new MonitorError(`--${next} cannot be combined with --${current}`, 'INVALID_CONFIG');
  }
  return current === 'help' ? current : next;
}

export function parseMonitorArgs(argv: string[], base: MonitorConfig): MonitorArgs {
  const config: MonitorConfig = { ...base };
  const symbols: string[] = [];
  let command: MonitorCommand = 'watch';
  let continuous = false;
  let everyDay = true;
  let failFast = false;
  let rawWindow: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--symbol':
        symbols.push(...parseList(requireValue(argv, i, arg)));
        i++;
        break;
      case '--check':
        command = setCommand(command, 'check');
        break;
      case '--history':
        command = setCommand(command, 'history');
        break;
      case '--validate-email':
        command = setCommand(command, 'validate-email');
        break;
      case '--help':
      case '-h':
        command = 'help';
        break;
      case '--interval': {
        const raw = requireValue(argv, i, arg);
        const seconds = Number(raw);
        if (!Number.isInteger(seconds) || seconds <= 0) {
          throw new MonitorError(`Invalid interval: ${raw}. Use a positive number of seconds`, 'INVALID_CONFIG');
        }
        config.intervalSeconds = seconds;
        i++;
        break;
      }
      case '--window':
        rawWindow = requireValue(argv, i, arg);
        i++;
        break;
      case '--timezone':
        config.timeZone = assertTimeZone(requireValue(argv, i, arg));
        i++;
        break;
      case '--continuous':
        continuous = true;
        break;
      case '--once':
        everyDay = false;
        break;
      case '--fail-fast':
        failFast = true;
        break;
      case '--source': {
        const raw = requireValue(argv, i, arg);
        if (raw !== 'series' && raw !== 'image') {
          throw new MonitorError(`Invalid source: ${raw}. Use series or image`, 'INVALID_CONFIG');
        }
        config.source = raw;
        i++;
        break;
      }
      case '--rule':
        config.rule = parseSignalRule(requireValue(argv, i, arg));
        i++;
        break;
      case '--state-dir':
        config.stateDir = requireValue(argv, i, arg);
        i++;
        break;
      default:
        throw new MonitorError(`Unknown option: ${arg}`, 'INVALID_CONFIG');
    }
  }

  if (symbols.length > 0) {
    config.symbols = symbols;
  }

  // The window follows the final timezone, whichever flag came first
  if (rawWindow !== undefined) {
    config.window = parseWindow(rawWindow, config.timeZone);
  } else if (config.window && config.window.timeZone !== config.timeZone) {
    config.window = { ...config.window, timeZone: config.timeZone };
  }

  return { command, config, continuous, everyDay, failFast };
}
