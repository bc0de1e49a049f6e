import { describe, expect, it } from 'vitest';
import { parseMonitorArgs } from '../src/modules/nysi/cli/monitorArgs';
import { parseSimulateArgs } from '../src/modules/nysi/cli/simulateArgs';
import { loadMonitorConfig } from '../src/modules/nysi/config';

const BASE = loadMonitorConfig({});

describe('parseMonitorArgs', () => {
  it('watches with the environment configuration by default', () => {
    expect(parseMonitorArgs([], BASE)).toEqual({
      command: 'watch',
      config: BASE,
      continuous: false,
      everyDay: true,
      failFast: false,
    });
  });

  it('collects repeated and comma-separated symbols', () => {
    const args = parseMonitorArgs(['--symbol', '$NYSI,$NYMO', '--symbol', '$NAMO'], BASE);
    expect(args.config.symbols).toEqual(['$NYSI', '$NYMO', '$NAMO']);
  });

  it('applies every flag', () => {
    const args = parseMonitorArgs(
      [
        '--check',
        '--interval', '90',
        '--window', '08:00-09:00',
        '--timezone', 'UTC',
        '--continuous',
        '--once',
        '--fail-fast',
        '--source', 'image',
        '--rule', 'lookback:2',
        '--state-dir', 'tmp/state',
      ],
      BASE
    );

    expect(args).toMatchObject({ command: 'check', continuous: true, everyDay: false, failFast: true });
    expect(args.config).toMatchObject({
      intervalSeconds: 90,
      window: { startMinute: 480, endMinute: 540, timeZone: 'UTC' },
      timeZone: 'UTC',
      source: 'image',
      rule: { kind: 'lookback', points: 2 },
      stateDir: 'tmp/state',
    });
  });

  it('moves the configured window into a new timezone', () => {
    const args = parseMonitorArgs(['--timezone', 'America/New_York'], BASE);
    expect(args.config.window).toEqual({ startMinute: 570, endMinute: 630, timeZone: 'America/New_York' });
  });

  it('selects the one-shot commands', () => {
    expect(parseMonitorArgs(['--history'], BASE).command).toBe('history');
    expect(parseMonitorArgs(['--validate-email'], BASE).command).toBe('validate-email');
    expect(parseMonitorArgs(['--check', '--help'], BASE).command).toBe('help');
  });

  it('rejects bad input', () => {
    expect(() => parseMonitorArgs(['--interval', '0'], BASE)).toThrow('Invalid interval: 0. Use a positive number of seconds');
    expect(() => parseMonitorArgs(['--symbol'], BASE)).toThrow('Missing value for --symbol');
    expect(() => parseMonitorArgs(['--source', 'ftp'], BASE)).toThrow('Invalid source: ftp. Use series or image');
    expect(() => parseMonitorArgs(['--check', '--history'], BASE)).toThrow('--history cannot be combined with --check');
    expect(() => parseMonitorArgs(['--verbose'], BASE)).toThrow('Unknown option: --verbose');
  });
});

describe('parseSimulateArgs', () => {
  it('uses the defaults', () => {
    expect(parseSimulateArgs([])).toEqual({
      help: false,
      indicator: '$NYSI',
      stock: 'GGUS.AX',
      buySignal: 'Rising',
      months: 12,
      priceType: 'Close',
      alignment: 'next-trading-day',
      warnings: [],
    });
  });

  it('reads short and long flags', () => {
    const args = parseSimulateArgs([
      '-i', '$NYMO',
      '--stock', 'GDX',
      '-b', 'red',
      '-m', '6',
      '-p', 'open',
      '-o', 'report.json',
      '--align', 'same-day',
      '--blacklist-start', '2024-03-01',
      '--blacklist-end', '2024-03-31',
    ]);

    expect(args).toMatchObject({
      indicator: '$NYMO',
      stock: 'GDX',
      buySignal: 'Declining',
      months: 6,
      priceType: 'Open',
      output: 'report.json',
      alignment: 'same-day',
      blacklist: { start: '2024-03-01', end: '2024-03-31' },
    });
  });

  it('disables a reversed blacklist with a warning', () => {
    const args = parseSimulateArgs(['--blacklist-start', '2024-04-01', '--blacklist-end', '2024-03-01']);
    expect(args.blacklist).toBeUndefined();
    expect(args.warnings).toEqual(['Blacklist start 2024-04-01 is after end 2024-03-01; blacklist disabled']);
  });

  it('rejects bad input', () => {
    expect(() => parseSimulateArgs(['--blacklist-start', '2024-04-01'])).toThrow(
      '--blacklist-start and --blacklist-end must be given together'
    );
    expect(() => parseSimulateArgs(['-b', 'Green'])).toThrow('Invalid buy signal: Green. Use Black or Red');
    expect(() => parseSimulateArgs(['-m', '1.5'])).toThrow('Invalid months: 1.5. Use a positive whole number');
    expect(() => parseSimulateArgs(['--blacklist-end', '2024-02-30'])).toThrow(
      'Invalid date for --blacklist-end: 2024-02-30. Use YYYY-MM-DD'
    );
  });
});
