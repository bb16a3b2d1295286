import { isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { MAX_ALERT_TIMEOUT_MS, MAX_PROCESS_CALL_MS } from '../constants';

const csv = z
  .string()
  .transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean));

/** Bot settings are read case-insensitively, so variable names are compared in upper case. */
const keyList = csv.transform((keys) => keys.map((k) => k.toUpperCase()));

/** `KEY[:true|false]` entries; the suffix is the bot's default when the key is unset. */
const flagList = csv.transform((entries, ctx) =>
  entries.map((entry) => {
    const [key, fallback = 'true'] = entry.split(':').map((s) => s.trim());
    if (fallback !== 'true' && fallback !== 'false') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${entry}: default must be true or false` });
    }
    return { key: key.toUpperCase(), defaultEnabled: fallback !== 'false' };
  }),
);

const bool = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const seconds = z.coerce.number().int().nonnegative();

/** Raw environment shape. Paths stay relative here and are resolved against BOT_DIR below. */
const envSchema = z.object({
  BOT_DIR: z.string().optional(),
  BOT_ENV_FILE: z.string().default('.env'),
  HEARTBEAT_PATH: z.string().default('data/bot_heartbeat'),
  HEARTBEAT_MAX_AGE_SECONDS: seconds.default(600),
  STARTUP_GRACE_SECONDS: seconds.default(300),
  LOG_DIR: z.string().default('logs'),
  STATE_DIR: z.string().default('data/botkeeper'),

  PROCESS_CONTROL: z.enum(['systemd', 'pid']).default('systemd'),
  SYSTEMD_UNIT: z.string().min(1).default('ktrade-bot'),
  SYSTEMCTL_SUDO: bool.default('false'),
  BOT_PROCESS_PATTERN: z.string().min(1).default('run_bot.py'),
  BOT_START_COMMAND: z.string().min(1).default('python scripts/run_bot.py'),
  STOP_GRACE_SECONDS: seconds.default(20),
  START_TIMEOUT_SECONDS: seconds.default(30),
  RESTART_COOLDOWN_SECONDS: seconds.default(900),

  WATCHDOG_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  WATCHDOG_LOCK_TTL_SECONDS: z.coerce.number().int().positive().default(120),
  LOCK_BACKEND: z.enum(['file', 'redis']).default('file'),
  REDIS_URL: z.string().optional(),

  ALERT_CHANNEL: z.enum(['slack', 'telegram', 'email', 'none']).default('slack'),
  ALERT_PREFIX: z.string().default('KTrade'),
  ALERT_TIMEOUT_MS: z.coerce.number().int().positive().default(MAX_ALERT_TIMEOUT_MS),
  SLACK_WEBHOOK_URL: z.string().url().optional(),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  ALERT_EMAIL_TO: z.string().email().optional(),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_SECURE: bool.default('true'),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: z.string().optional(),

  DATABASE_URL: z.string().default('data/ktrade.db'),

  AGENT: z.enum(['cli', 'openai']).default('cli'),
  AGENT_COMMAND: z.string().min(1).default('claude --print -p'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPTIMIZER_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
  ANALYSIS_WINDOW_DAYS: z.coerce.number().int().positive().default(7),

  MAX_POSITION_SIZE_CEILING_PCT: z.coerce.number().positive().max(100).default(10),
  POSITION_SIZE_KEY: z.string().min(1).transform((k) => k.toUpperCase()).default('MAX_POSITION_SIZE_PCT'),
  RISK_CONTROL_KEYS: keyList.default(
    'MAX_POSITION_SIZE_PCT,MAX_PORTFOLIO_EXPOSURE_PCT,DAILY_LOSS_LIMIT_PCT,DEFAULT_STOP_LOSS_PCT',
  ),
  RISK_CONTROL_PATHS: csv.default('src/core/risk_manager.py'),
  STRATEGY_FLAGS: flagList.default(
    'ENABLE_SIMPLE_MOMENTUM:true,ENABLE_DCA:true,ENABLE_GRID_TRADING:true,ENABLE_SENTIMENT_MOMENTUM:false',
  ),
  PROTECTED_PATHS: csv.default('data'),

  WATCHDOG_CRON: z.string().default('*/5 * * * *'),
  OPTIMIZER_CRON: z.string().default('30 16 * * 1-5'),
  BOTKEEPER_CLI: z.string().optional(),
});

export type AlertChannel = 'slack' | 'telegram' | 'email' | 'none';

export interface StrategyFlag {
  key: string;
  /** Whether the bot runs the strategy when its key is absent. */
  defaultEnabled: boolean;
}

export interface SafetyEnvelope {
  maxPositionSizePct: number;
  positionSizeKey: string;
  riskControlKeys: readonly string[];
  riskControlPaths: readonly string[];
  strategyFlags: readonly StrategyFlag[];
  protectedPaths: readonly string[];
}

export interface BotkeeperConfig {
  botDir: string;
  botEnvFile: string;
  heartbeatPath: string;
  heartbeatMaxAgeSeconds: number;
  startupGraceSeconds: number;
  logDir: string;
  stateDir: string;

  process: {
    control: 'systemd' | 'pid';
    systemdUnit: string;
    sudo: boolean;
    pattern: string;
    startCommand: string;
    stopGraceMs: number;
    startTimeoutMs: number;
    restartCooldownMs: number;
  };

  watchdog: {
    intervalMs: number;
    lockTtlSeconds: number;
  };

  lock: {
    backend: 'file' | 'redis';
    redisUrl?: string;
  };

  alerts: {
    channel: AlertChannel;
    prefix: string;
    timeoutMs: number;
    slackWebhookUrl?: string;
    telegramBotToken?: string;
    telegramChatId?: string;
    emailTo?: string;
    smtp: {
      host?: string;
      port: number;
      secure: boolean;
      user?: string;
      pass?: string;
      from?: string;
    };
  };

  databaseUrl: string;

  optimizer: {
    agent: 'cli' | 'openai';
    agentCommand: string;
    openaiApiKey?: string;
    openaiModel: string;
    openaiBaseUrl?: string;
    timeoutMs: number;
    analysisWindowDays: number;
  };

  envelope: SafetyEnvelope;

  schedule: {
    watchdogCron: string;
    optimizerCron: string;
    cli: string;
  };
}

/**
 * Parses the environment into a frozen config. Throws {@link ConfigError}
 * listing every invalid key at once.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): BotkeeperConfig {
  // `KEY=` in a .env file means unset, not an empty value
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  const botDir = resolve(cwd, e.BOT_DIR ?? '.');
  const inBot = (p: string) => (isAbsolute(p) ? p : resolve(botDir, p));

  if (e.LOCK_BACKEND === 'redis' && !e.REDIS_URL) {
    throw new ConfigError('REDIS_URL must be set when LOCK_BACKEND=redis');
  }
  if (e.AGENT === 'openai' && !e.OPENAI_API_KEY) {
    throw new ConfigError('OPENAI_API_KEY must be set when AGENT=openai');
  }

  return deepFreeze({
    botDir,
    botEnvFile: inBot(e.BOT_ENV_FILE),
    heartbeatPath: inBot(e.HEARTBEAT_PATH),
    heartbeatMaxAgeSeconds: e.HEARTBEAT_MAX_AGE_SECONDS,
    startupGraceSeconds: e.STARTUP_GRACE_SECONDS,
    logDir: inBot(e.LOG_DIR),
    stateDir: inBot(e.STATE_DIR),

    process: {
      control: e.PROCESS_CONTROL,
      systemdUnit: e.SYSTEMD_UNIT,
      sudo: e.SYSTEMCTL_SUDO,
      pattern: e.BOT_PROCESS_PATTERN,
      startCommand: e.BOT_START_COMMAND,
      stopGraceMs: Math.min(e.STOP_GRACE_SECONDS * 1000, MAX_PROCESS_CALL_MS),
      startTimeoutMs: Math.min(e.START_TIMEOUT_SECONDS * 1000, MAX_PROCESS_CALL_MS),
      restartCooldownMs: e.RESTART_COOLDOWN_SECONDS * 1000,
    },

    watchdog: {
      intervalMs: e.WATCHDOG_INTERVAL_SECONDS * 1000,
      lockTtlSeconds: e.WATCHDOG_LOCK_TTL_SECONDS,
    },

    lock: {
      backend: e.LOCK_BACKEND,
      redisUrl: e.REDIS_URL,
    },

    alerts: {
      channel: e.ALERT_CHANNEL,
      prefix: e.ALERT_PREFIX,
      timeoutMs: Math.min(e.ALERT_TIMEOUT_MS, MAX_ALERT_TIMEOUT_MS),
      slackWebhookUrl: e.SLACK_WEBHOOK_URL,
      telegramBotToken: e.TELEGRAM_BOT_TOKEN,
      telegramChatId: e.TELEGRAM_CHAT_ID,
      emailTo: e.ALERT_EMAIL_TO,
      smtp: {
        host: e.SMTP_HOST,
        port: e.SMTP_PORT,
        secure: e.SMTP_SECURE,
        user: e.SMTP_USER,
        pass: e.SMTP_PASS,
        from: e.SMTP_FROM,
      },
    },

    databaseUrl: resolveDatabaseUrl(e.DATABASE_URL, botDir),

    optimizer: {
      agent: e.AGENT,
      agentCommand: e.AGENT_COMMAND,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiModel: e.OPENAI_MODEL,
      openaiBaseUrl: e.OPENAI_BASE_URL,
      timeoutMs: Math.round(e.OPTIMIZER_TIMEOUT_MINUTES * 60_000),
      analysisWindowDays: e.ANALYSIS_WINDOW_DAYS,
    },

    envelope: {
      maxPositionSizePct: e.MAX_POSITION_SIZE_CEILING_PCT,
      positionSizeKey: e.POSITION_SIZE_KEY,
      riskControlKeys: e.RISK_CONTROL_KEYS,
      riskControlPaths: e.RISK_CONTROL_PATHS,
      strategyFlags: e.STRATEGY_FLAGS,
      protectedPaths: e.PROTECTED_PATHS,
    },

    schedule: {
      watchdogCron: e.WATCHDOG_CRON,
      optimizerCron: e.OPTIMIZER_CRON,
      cli: e.BOTKEEPER_CLI ?? `cd ${resolve(__dirname, '../../../..')} && npx tsx apps/warden/src/main.ts`,
    },
  });
}

/** SQLAlchemy-style URLs (`sqlite:///data/x.db`) and plain paths, relative to BOT_DIR. */
function resolveDatabaseUrl(url: string, botDir: string): string {
  if (url === ':memory:') return url;
  const path = url.startsWith('sqlite:///') ? url.slice('sqlite:///'.length) : url;
  return isAbsolute(path) ? path : resolve(botDir, path);
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
