import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { loadConfig } from './botkeeper-config';

describe('loadConfig', () => {
  it('resolves bot-relative paths and applies defaults', () => {
    const config = loadConfig({ BOT_DIR: '/srv/bot' }, '/');

    expect(config.botDir).toBe('/srv/bot');
    expect(config.botEnvFile).toBe('/srv/bot/.env');
    expect(config.heartbeatPath).toBe('/srv/bot/data/bot_heartbeat');
    expect(config.logDir).toBe('/srv/bot/logs');
    expect(config.stateDir).toBe('/srv/bot/data/botkeeper');
    expect(config.heartbeatMaxAgeSeconds).toBe(600);
    expect(config.process.control).toBe('systemd');
    expect(config.process.restartCooldownMs).toBe(900_000);
    expect(config.optimizer.timeoutMs).toBe(1_800_000);
    expect(config.alerts.channel).toBe('slack');
  });

  it('resolves BOT_DIR against the working directory', () => {
    expect(loadConfig({ BOT_DIR: 'bot' }, '/home/ops').botDir).toBe('/home/ops/bot');
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ BOT_DIR: '/srv/bot', HEARTBEAT_MAX_AGE_SECONDS: '', SLACK_WEBHOOK_URL: '' }, '/');

    expect(config.heartbeatMaxAgeSeconds).toBe(600);
    expect(config.alerts.slackWebhookUrl).toBeUndefined();
  });

  it('caps process and alert timeouts', () => {
    const config = loadConfig(
      { BOT_DIR: '/srv/bot', STOP_GRACE_SECONDS: '120', START_TIMEOUT_SECONDS: '90', ALERT_TIMEOUT_MS: '60000' },
      '/',
    );

    expect(config.process.stopGraceMs).toBe(30_000);
    expect(config.process.startTimeoutMs).toBe(30_000);
    expect(config.alerts.timeoutMs).toBe(10_000);
  });

  it('accepts sqlite URLs for the trade database', () => {
    expect(loadConfig({ BOT_DIR: '/srv/bot', DATABASE_URL: 'sqlite:///data/ktrade.db' }, '/').databaseUrl).toBe(
      '/srv/bot/data/ktrade.db',
    );
    expect(loadConfig({ BOT_DIR: '/srv/bot', DATABASE_URL: 'sqlite:////var/db/trades.db' }, '/').databaseUrl).toBe(
      '/var/db/trades.db',
    );
  });

  it('splits comma separated envelope lists and upper-cases their keys', () => {
    const config = loadConfig(
      { BOT_DIR: '/srv/bot', RISK_CONTROL_KEYS: 'a, B,,c', POSITION_SIZE_KEY: 'max_position_size_pct' },
      '/',
    );

    expect(config.envelope.riskControlKeys).toEqual(['A', 'B', 'C']);
    expect(config.envelope.positionSizeKey).toBe('MAX_POSITION_SIZE_PCT');
  });

  it('gives every strategy flag the default the bot uses', () => {
    expect(loadConfig({ BOT_DIR: '/srv/bot' }, '/').envelope.strategyFlags).toEqual([
      { key: 'ENABLE_SIMPLE_MOMENTUM', defaultEnabled: true },
      { key: 'ENABLE_DCA', defaultEnabled: true },
      { key: 'ENABLE_GRID_TRADING', defaultEnabled: true },
      { key: 'ENABLE_SENTIMENT_MOMENTUM', defaultEnabled: false },
    ]);
  });

  it('parses strategy flag defaults, enabled unless marked false', () => {
    const config = loadConfig({ BOT_DIR: '/srv/bot', STRATEGY_FLAGS: 'enable_a:false, ENABLE_B' }, '/');

    expect(config.envelope.strategyFlags).toEqual([
      { key: 'ENABLE_A', defaultEnabled: false },
      { key: 'ENABLE_B', defaultEnabled: true },
    ]);
  });

  it('rejects a strategy flag default that is not a boolean', () => {
    expect(() => loadConfig({ STRATEGY_FLAGS: 'ENABLE_A:maybe' }, '/')).toThrow(
      'Invalid configuration: STRATEGY_FLAGS: ENABLE_A:maybe: default must be true or false',
    );
  });

  it('reads SMTP settings with their defaults', () => {
    expect(loadConfig({ BOT_DIR: '/srv/bot' }, '/').alerts.smtp).toEqual({
      host: undefined,
      port: 465,
      secure: true,
      user: undefined,
      pass: undefined,
      from: undefined,
    });
    expect(
      loadConfig({ SMTP_HOST: 'smtp.example.test', SMTP_PORT: '587', SMTP_SECURE: 'false', SMTP_USER: 'bot' }, '/').alerts
        .smtp,
    ).toMatchObject({ host: 'smtp.example.test', port: 587, secure: false, user: 'bot' });
  });

  it('reports every invalid key at once', () => {
    expect(() => loadConfig({ PROCESS_CONTROL: 'docker', HEARTBEAT_MAX_AGE_SECONDS: '-1' }, '/')).toThrow(ConfigError);
    expect(() => loadConfig({ PROCESS_CONTROL: 'docker', HEARTBEAT_MAX_AGE_SECONDS: '-1' }, '/')).toThrow(
      /HEARTBEAT_MAX_AGE_SECONDS: .*; PROCESS_CONTROL: /,
    );
  });

  it('requires a redis URL for the redis lock backend', () => {
    expect(() => loadConfig({ LOCK_BACKEND: 'redis' }, '/')).toThrow('REDIS_URL must be set when LOCK_BACKEND=redis');
  });

  it('requires an API key for the openai agent', () => {
    expect(() => loadConfig({ AGENT: 'openai' }, '/')).toThrow('OPENAI_API_KEY must be set when AGENT=openai');
  });

  it('returns a frozen config', () => {
    const config = loadConfig({ BOT_DIR: '/srv/bot' }, '/');

    expect(Object.isFrozen(config.process)).toBe(true);
  });
});
