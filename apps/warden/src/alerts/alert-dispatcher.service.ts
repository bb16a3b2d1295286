import { appendFileSync, mkdirSync } from 'fs';
import { hostname } from 'os';
import { join } from 'path';
import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import * as nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { MetricsService } from '@botkeeper/worker-core';
import type { BotkeeperConfig } from '../config/botkeeper-config';
import type { Clock } from '../clock';
import { ALERT_FALLBACK_FILE, BOTKEEPER_CONFIG, CLOCK } from '../constants';
import { errorMessage } from '../errors';
import type { AlertDelivery, AlertInput, AlertMessage } from './alert.types';
import {
  buildPlainText,
  buildSlackPayload,
  buildTelegramText,
  formatFallbackLine,
  toAlertMessage,
} from './alert-format';

/**
 * Delivers alerts to the configured channel with one bounded attempt, and
 * appends exactly one line to the local alert log whenever that attempt is
 * not confirmed. `send` never rejects.
 */
@Injectable()
export class AlertDispatcher implements OnModuleInit {
  private transporter?: Transporter;
  private readonly host = hostname();

  constructor(
    @Inject(BOTKEEPER_CONFIG) private readonly config: BotkeeperConfig,
    @InjectPinoLogger(AlertDispatcher.name) private readonly logger: PinoLogger,
    @Inject(MetricsService) private readonly metrics: MetricsService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  onModuleInit() {
    const { channel, smtp, timeoutMs } = this.config.alerts;
    if (channel === 'email' && smtp.host) {
      this.transporter = nodemailer.createTransport({
        host: smtp.host,
        port: smtp.port,
        secure: smtp.secure,
        auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
        connectionTimeout: timeoutMs,
        greetingTimeout: timeoutMs,
        socketTimeout: timeoutMs,
      });
    }
  }

  get fallbackPath(): string {
    return join(this.config.logDir, ALERT_FALLBACK_FILE);
  }

  async send(input: AlertInput): Promise<AlertDelivery> {
    const msg = toAlertMessage(input, this.clock.now(), this.host);
    let delivered = false;
    try {
      delivered = await this.deliver(msg);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err), subject: msg.subject }, 'Alert delivery failed');
    }
    if (delivered) {
      this.metrics.increment('alerts.delivered', 1, { channel: this.config.alerts.channel });
      this.logger.info({ subject: msg.subject, severity: msg.severity }, 'Alert sent');
      return 'delivered';
    }
    this.writeFallback(msg);
    return 'fallback';
  }

  /** Resolves true only on a confirmed delivery. */
  private async deliver(msg: AlertMessage): Promise<boolean> {
    const { alerts } = this.config;
    switch (alerts.channel) {
      case 'slack':
        if (!alerts.slackWebhookUrl) return this.notConfigured('SLACK_WEBHOOK_URL');
        return this.sendSlack(alerts.slackWebhookUrl, msg);
      case 'telegram':
        if (!alerts.telegramBotToken || !alerts.telegramChatId) {
          return this.notConfigured('TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID');
        }
        return this.sendTelegram(alerts.telegramBotToken, alerts.telegramChatId, msg);
      case 'email':
        if (!alerts.emailTo || !this.transporter) return this.notConfigured('ALERT_EMAIL_TO/SMTP_HOST');
        return this.sendEmail(this.transporter, alerts.emailTo, msg);
      case 'none':
        return false;
    }
  }

  private notConfigured(keys: string): boolean {
    this.logger.warn({ channel: this.config.alerts.channel, missing: keys }, 'Alert channel not configured, writing to local log');
    return false;
  }

  private async sendSlack(webhookUrl: string, msg: AlertMessage): Promise<boolean> {
    const response = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildSlackPayload(msg, this.config.alerts.prefix)),
      signal: AbortSignal.timeout(this.config.alerts.timeoutMs),
    });
    // Incoming webhooks answer a literal "ok" on success
    const text = (await response.text()).trim();
    if (!response.ok || text !== 'ok') {
      this.logger.warn({ status: response.status, response: text.slice(0, 200) }, 'Slack webhook delivery failed');
      return false;
    }
    return true;
  }

  private async sendTelegram(botToken: string, chatId: string, msg: AlertMessage): Promise<boolean> {
    const url = `https://api.telegram.org/bot${botToken}/sendMessage`;
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: chatId,
        text: buildTelegramText(msg, this.config.alerts.prefix),
        parse_mode: 'HTML',
      }),
      signal: AbortSignal.timeout(this.config.alerts.timeoutMs),
    });
    if (!response.ok) {
      this.logger.warn({ status: response.status }, 'Telegram notification delivery failed');
      return false;
    }
    return true;
  }

  private async sendEmail(transporter: Transporter, to: string, msg: AlertMessage): Promise<boolean> {
    const text = buildPlainText(msg);
    await transporter.sendMail({
      from: this.config.alerts.smtp.from ?? this.config.alerts.smtp.user,
      to,
      subject: `${this.config.alerts.prefix} Alert: ${msg.subject}`,
      text,
      html: `<pre style="font-family:monospace">${text.replace(/\n/g, '<br>')}</pre>`,
    });
    this.logger.debug({ to }, 'Alert email sent');
    return true;
  }

  private writeFallback(msg: AlertMessage): void {
    this.metrics.increment('alerts.fallback', 1, { channel: this.config.alerts.channel });
    try {
      mkdirSync(this.config.logDir, { recursive: true });
      appendFileSync(this.fallbackPath, formatFallbackLine(msg), 'utf8');
      this.logger.info({ subject: msg.subject, path: this.fallbackPath }, 'Alert written to local alert log');
    } catch (err) {
      this.logger.error({ err, subject: msg.subject }, 'Failed to write alert to local alert log');
    }
  }
}
