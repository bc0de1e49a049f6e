/**
 * Environment configuration
 *
 * Reads monitor and SMTP settings from process.env (populated from .env.local /
 * .env by scripts/load-env). CLI flags are applied on top by the scripts.
 */

import { z } from 'zod';
import { DEFAULT_CHART_REGION, parseChartRegion } from './engine/chartPixels';
import type { ChartRegion } from './engine/chartPixels';
import { DEFAULT_SIGNAL_RULE, parseSignalRule } from './engine/classifySignal';
import type { SignalRule } from './engine/classifySignal';
import { assertTimeZone, parseWindow } from './engine/monitoringWindow';
import type { MonitoringWindow } from './engine/monitoringWindow';
import type { SignalSourceVariant } from './data/providers';
import { MonitorError } from './errors';
import type { EmailConfig } from './notify/email';

export type Env = Record<string, string | undefined>;

export interface MonitorConfig {
  symbols: string[];
  stateDir: string;
  source: SignalSourceVariant;
  rule: SignalRule;
  lookbackDays: number;
  intervalSeconds: number;
  window: MonitoringWindow | null;
  timeZone: string;
  awaitFreshData: boolean;
  chartRegion: ChartRegion;
}

export const DEFAULT_SYMBOL = '$NYSI';
export const DEFAULT_TIMEZONE = 'Australia/Sydney';
export const DEFAULT_WINDOW = '09:30-10:30';

// Empty strings count as unset
const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const flag = optionalText.transform((v, ctx) => {
  if (v === undefined) return undefined;
  const lower = v.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lower)) return true;
  if (['0', 'false', 'no', 'off'].includes(lower)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
  return z.NEVER;
});

const positiveInt = optionalText.pipe(z.coerce.number().int().positive().optional());

const monitorEnvSchema = z.object({
  NYSI_SYMBOLS: optionalText,
  NYSI_STATE_DIR: optionalText,
  NYSI_SOURCE: optionalText.pipe(z.enum(['series', 'image']).optional()),
  NYSI_SIGNAL_RULE: optionalText,
  NYSI_LOOKBACK_DAYS: positiveInt,
  NYSI_INTERVAL_SECONDS: positiveInt,
  NYSI_WINDOW: z.string().optional(),
  NYSI_TIMEZONE: optionalText,
  NYSI_AWAIT_FRESH_DATA: flag,
  NYSI_CHART_REGION: optionalText,
});

const emailEnvSchema = z.object({
  SMTP_HOST: optionalText,
  SMTP_PORT: optionalText.pipe(z.coerce.number().int().min(1).max(65535).optional()),
  SMTP_SECURE: flag,
  SMTP_USER: optionalText,
  SMTP_PASS: optionalText,
  SMTP_FROM: optionalText,
  SMTP_TO: optionalText,
});

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new MonitorError(`Invalid environment configuration: ${details}`, 'INVALID_CONFIG');
  }
  return result.data;
}

export function parseList(raw: string): string[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadMonitorConfig(env: Env = process.env): MonitorConfig {
  const parsed = parseEnv(monitorEnvSchema, env);
  const timeZone = assertTimeZone(parsed.NYSI_TIMEZONE ?? DEFAULT_TIMEZONE);

  // Unset uses the default window; set-but-empty disables it
  const rawWindow = parsed.NYSI_WINDOW === undefined ? DEFAULT_WINDOW : parsed.NYSI_WINDOW.trim();

  return {
    symbols: parseList(parsed.NYSI_SYMBOLS ?? DEFAULT_SYMBOL),
    stateDir: parsed.NYSI_STATE_DIR ?? 'data/state',
    source: parsed.NYSI_SOURCE ?? 'series',
    rule: parsed.NYSI_SIGNAL_RULE ? parseSignalRule(parsed.NYSI_SIGNAL_RULE) : DEFAULT_SIGNAL_RULE,
    lookbackDays: parsed.NYSI_LOOKBACK_DAYS ?? 11,
    intervalSeconds: parsed.NYSI_INTERVAL_SECONDS ?? 30,
    window: rawWindow === '' ? null : parseWindow(rawWindow, timeZone),
    timeZone,
    awaitFreshData: parsed.NYSI_AWAIT_FRESH_DATA ?? true,
    chartRegion: parsed.NYSI_CHART_REGION
      ? parseChartRegion(parsed.NYSI_CHART_REGION)
      : DEFAULT_CHART_REGION,
  };
}

/**
 * SMTP settings, or null when credentials are missing (notifications disabled).
 * Recipients default to the sender address.
 */
export function loadEmailConfig(env: Env = process.env): EmailConfig | null {
  const parsed = parseEnv(emailEnvSchema, env);
  if (!parsed.SMTP_USER || !parsed.SMTP_PASS) {
    return null;
  }

  const port = parsed.SMTP_PORT ?? 587;
  const recipients = parsed.SMTP_TO ? parseList(parsed.SMTP_TO) : [];

  return {
    host: parsed.SMTP_HOST ?? 'smtp.gmail.com',
    port,
    secure: parsed.SMTP_SECURE ?? port === 465,
    user: parsed.SMTP_USER,
    pass: parsed.SMTP_PASS,
    from: parsed.SMTP_FROM ?? parsed.SMTP_USER,
    recipients: recipients.length > 0 ? recipients : [parsed.SMTP_USER],
  };
}
