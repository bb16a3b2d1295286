import { existsSync, readFileSync, rmSync } from 'fs';
import { hostname } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeClock, makeBotDir, makeConfig, makeLogger, makeMetrics } from '../test/fakes';
import { AlertDispatcher } from './alert-dispatcher.service';

const NOW = new Date('2026-03-02T16:30:00Z');

const mail = vi.hoisted(() => ({ createTransport: vi.fn(), sendMail: vi.fn() }));

vi.mock('nodemailer', () => ({ createTransport: mail.createTransport }));

describe('AlertDispatcher', () => {
  let botDir: string;
  let fetchMock: ReturnType<typeof vi.fn>;

  function makeDispatcher(env: Record<string, string>) {
    const metrics = makeMetrics();
    const dispatcher = new AlertDispatcher(
      makeConfig(botDir, env),
      makeLogger(),
      metrics,
      new FakeClock(NOW),
    );
    dispatcher.onModuleInit();
    return { dispatcher, metrics };
  }

  function fallbackLines(): string[] {
    const path = join(botDir, 'logs', 'alerts.log');
    if (!existsSync(path)) return [];
    return readFileSync(path, 'utf8').split('\n').filter(Boolean);
  }

  beforeEach(() => {
    botDir = makeBotDir();
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    rmSync(botDir, { recursive: true, force: true });
  });

  describe('slack', () => {
    const env = { ALERT_CHANNEL: 'slack', SLACK_WEBHOOK_URL: 'https://hooks.example.test/services/test' };

    it('delivers once and writes nothing locally when the webhook answers ok', async () => {
      fetchMock.mockResolvedValue(new Response('ok', { status: 200 }));
      const { dispatcher, metrics } = makeDispatcher(env);

      const result = await dispatcher.send({ subject: 'Bot Restarted', body: 'Heartbeat was stale', severity: 'Informational' });

      expect(result).toBe('delivered');
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fallbackLines()).toEqual([]);
      expect(metrics.increment).toHaveBeenCalledWith('alerts.delivered', 1, { channel: 'slack' });
    });

    it('posts the block payload to the webhook', async () => {
      fetchMock.mockResolvedValue(new Response('ok', { status: 200 }));
      const { dispatcher } = makeDispatcher(env);

      await dispatcher.send({ subject: 'Start Failed', body: 'unit failed', severity: 'Urgent' });

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://hooks.example.test/services/test');
      const payload = JSON.parse(String(init.body));
      expect(payload.text).toBe('KTrade Alert: Start Failed');
      expect(payload.blocks[0].text.text).toBe('🚨 KTrade Alert: Start Failed');
      expect(payload.blocks[1].text.text).toBe('unit failed');
      expect(payload.blocks[2].elements[0].text).toBe(`📅 2026-03-02 16:30:00 UTC | 🖥️ ${hostname()}`);
    });

    it('falls back to exactly one local line when the webhook rejects', async () => {
      fetchMock.mockResolvedValue(new Response('invalid_token', { status: 403 }));
      const { dispatcher, metrics } = makeDispatcher(env);

      const result = await dispatcher.send({ subject: 'Restart Failed', body: 'systemctl exited 1', severity: 'Urgent' });

      expect(result).toBe('fallback');
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fallbackLines()).toEqual([
        `[2026-03-02 16:30:00 UTC] URGENT host=${hostname()} ALERT: Restart Failed - systemctl exited 1`,
      ]);
      expect(metrics.increment).toHaveBeenCalledWith('alerts.fallback', 1, { channel: 'slack' });
    });

    it('falls back without retrying when the request throws', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const { dispatcher } = makeDispatcher(env);

      await expect(
        dispatcher.send({ subject: 'Bot Started', body: 'was not running', severity: 'Urgent' }),
      ).resolves.toBe('fallback');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fallbackLines()).toHaveLength(1);
    });

    it('treats a 200 with an unexpected body as not delivered', async () => {
      fetchMock.mockResolvedValue(new Response('no_service', { status: 200 }));
      const { dispatcher } = makeDispatcher(env);

      await expect(
        dispatcher.send({ subject: 'x', body: 'y', severity: 'Informational' }),
      ).resolves.toBe('fallback');
    });
  });

  it('writes locally without any network call when the channel is none', async () => {
    const { dispatcher } = makeDispatcher({ ALERT_CHANNEL: 'none' });

    await dispatcher.send({ subject: 'Optimization Complete', body: 'line one\nline two', severity: 'Informational' });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(fallbackLines()).toEqual([
      `[2026-03-02 16:30:00 UTC] INFORMATIONAL host=${hostname()} ALERT: Optimization Complete - line one | line two`,
    ]);
  });

  it('writes locally when the selected channel has no credentials', async () => {
    const { dispatcher } = makeDispatcher({ ALERT_CHANNEL: 'telegram' });

    await expect(
      dispatcher.send({ subject: 'Bot Restarted', body: 'ok', severity: 'Informational' }),
    ).resolves.toBe('fallback');

    expect(fetchMock).not.toHaveBeenCalled();
    expect(fallbackLines()).toHaveLength(1);
  });

  it('sends telegram messages as HTML to the bot API', async () => {
    fetchMock.mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    const { dispatcher } = makeDispatcher({
      ALERT_CHANNEL: 'telegram',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_ID: '42',
    });

    await expect(
      dispatcher.send({ subject: 'P&L', body: '<b>x</b>', severity: 'Informational' }),
    ).resolves.toBe('delivered');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    const payload = JSON.parse(String(init.body));
    expect(payload.chat_id).toBe('42');
    expect(payload.parse_mode).toBe('HTML');
    expect(payload.text.startsWith('🤖 <b>KTrade Alert: P&amp;L</b>\n\n&lt;b&gt;x&lt;/b&gt;')).toBe(true);
  });

  it('substitutes placeholders for empty subject and body', async () => {
    const { dispatcher } = makeDispatcher({ ALERT_CHANNEL: 'none' });

    await dispatcher.send({ subject: '  ', body: '', severity: 'Urgent' });

    expect(fallbackLines()).toEqual([
      `[2026-03-02 16:30:00 UTC] URGENT host=${hostname()} ALERT: (no subject) - (no details)`,
    ]);
  });

  describe('email', () => {
    const env = {
      ALERT_CHANNEL: 'email',
      ALERT_EMAIL_TO: 'ops@example.test',
      SMTP_HOST: 'smtp.example.test',
      SMTP_PORT: '587',
      SMTP_SECURE: 'false',
      SMTP_USER: 'bot@example.test',
      SMTP_PASS: 'test-password',
    };

    beforeEach(() => {
      mail.createTransport.mockReset();
      mail.sendMail.mockReset();
      mail.sendMail.mockResolvedValue({ messageId: 'test-id' });
      mail.createTransport.mockReturnValue({ sendMail: mail.sendMail });
    });

    it('builds the SMTP transport from the loaded configuration', async () => {
      const { dispatcher } = makeDispatcher(env);

      await expect(
        dispatcher.send({ subject: 'Bot Down', body: 'no heartbeat', severity: 'Urgent' }),
      ).resolves.toBe('delivered');

      expect(mail.createTransport).toHaveBeenCalledWith({
        host: 'smtp.example.test',
        port: 587,
        secure: false,
        auth: { user: 'bot@example.test', pass: 'test-password' },
        connectionTimeout: 10_000,
        greetingTimeout: 10_000,
        socketTimeout: 10_000,
      });
      expect(mail.sendMail).toHaveBeenCalledWith(
        expect.objectContaining({ from: 'bot@example.test', to: 'ops@example.test', subject: 'KTrade Alert: Bot Down' }),
      );
    });

    it('prefers SMTP_FROM as the sender', async () => {
      const { dispatcher } = makeDispatcher({ ...env, SMTP_FROM: 'alerts@example.test' });

      await dispatcher.send({ subject: 'Bot Down', body: 'x', severity: 'Urgent' });

      expect(mail.sendMail).toHaveBeenCalledWith(expect.objectContaining({ from: 'alerts@example.test' }));
    });

    it('writes locally when no SMTP host is configured', async () => {
      const { dispatcher } = makeDispatcher({ ALERT_CHANNEL: 'email', ALERT_EMAIL_TO: 'ops@example.test' });

      await expect(
        dispatcher.send({ subject: 'Bot Down', body: 'x', severity: 'Urgent' }),
      ).resolves.toBe('fallback');

      expect(mail.createTransport).not.toHaveBeenCalled();
      expect(fallbackLines()).toHaveLength(1);
    });
  });
});
