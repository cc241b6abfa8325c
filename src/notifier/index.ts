import { performance } from 'node:perf_hooks';
import logger, { type Logger } from '../logger.js';
import type { AnomalyEvent } from '../types.js';
import { classifySeverity } from '../alerting/severity.js';
import { extractJobName } from '../alerting/fingerprint.js';
import { DEFAULT_BATCH_MAX_ITEMS, formatAnomalyMessage, formatBatchMessage } from './format.js';

export { formatAnomalyMessage, formatBatchMessage } from './format.js';

/**
 * Delivery contract the pipeline depends on. Implementations report failure by
 * resolving false; a rejection is treated the same way by the caller.
 */
export interface Notifier {
  sendOne(event: AnomalyEvent, channels: string[]): Promise<boolean>;
  sendBatch(events: AnomalyEvent[]): Promise<boolean>;
  withDestination(destination: string): Notifier;
}

export type NotifierConfig = {
  slackWebhookUrl?: string;
  webhookUrl?: string;
  timeoutMs?: number;
  batchMaxItems?: number;
  username?: string;
};

type HttpResponse = { status: number };

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<HttpResponse>;

type NotifierDependencies = {
  fetch?: FetchLike;
  log?: Logger;
  now?: () => number;
};

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USERNAME = 'CI/CD Anomaly Detector';
const SLACK_ICON = ':robot_face:';
const WEBHOOK_SUCCESS = new Set([200, 201, 202]);

export class ChannelNotifier implements Notifier {
  private readonly config: Readonly<NotifierConfig>;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(config: NotifierConfig = {}, dependencies: NotifierDependencies = {}) {
    this.config = { ...config };
    this.fetchImpl = dependencies.fetch ?? fetch;
    this.log = dependencies.log ?? logger;
    this.now = dependencies.now ?? Date.now;
  }

  get slackWebhookUrl(): string | null {
    return this.config.slackWebhookUrl || null;
  }

  withDestination(destination: string): Notifier {
    return new ChannelNotifier(
      { ...this.config, slackWebhookUrl: destination },
      { fetch: this.fetchImpl, log: this.log, now: this.now }
    );
  }

  async sendOne(event: AnomalyEvent, channels: string[]): Promise<boolean> {
    const results: Record<string, boolean> = {};
    for (const channel of new Set(channels)) {
      results[channel] = await this.sendToChannel(channel, event);
    }
    const delivered = Object.values(results).some(Boolean);
    if (!delivered) {
      this.log.warn({ jobName: extractJobName(event), results }, 'Alert was not delivered on any channel');
    }
    return delivered;
  }

  async sendBatch(events: AnomalyEvent[]): Promise<boolean> {
    if (events.length === 0) {
      return false;
    }
    const url = this.slackWebhookUrl;
    if (!url) {
      this.log.warn({ size: events.length }, 'Slack webhook not configured; batch alert dropped');
      return false;
    }
    const text = formatBatchMessage(events, this.config.batchMaxItems ?? DEFAULT_BATCH_MAX_ITEMS);
    const status = await this.post(url, this.slackPayload(text), 'slack');
    return status === 200;
  }

  private async sendToChannel(channel: string, event: AnomalyEvent): Promise<boolean> {
    switch (channel) {
      case 'slack':
        return this.sendSlack(event);
      case 'webhook':
        return this.sendWebhook(event);
      default:
        this.log.warn({ channel }, 'No transport configured for channel');
        return false;
    }
  }

  private async sendSlack(event: AnomalyEvent): Promise<boolean> {
    const url = this.slackWebhookUrl;
    if (!url) {
      this.log.warn({ channel: 'slack' }, 'Slack webhook not configured');
      return false;
    }
    const text = formatAnomalyMessage(event, classifySeverity(event), this.now());
    const status = await this.post(url, this.slackPayload(text), 'slack');
    return status === 200;
  }

  private async sendWebhook(event: AnomalyEvent): Promise<boolean> {
    const url = this.config.webhookUrl;
    if (!url) {
      this.log.warn({ channel: 'webhook' }, 'Webhook URL not configured');
      return false;
    }
    const payload = {
      type: 'anomaly_detected',
      timestamp: new Date(this.now()).toISOString(),
      anomaly: event
    };
    const status = await this.post(url, payload, 'webhook');
    return status !== null && WEBHOOK_SUCCESS.has(status);
  }

  private slackPayload(text: string) {
    return {
      text,
      username: this.config.username ?? DEFAULT_USERNAME,
      icon_emoji: SLACK_ICON
    };
  }

  private async post(url: string, payload: unknown, channel: string): Promise<number | null> {
    const start = performance.now();
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS)
      });
      const durationMs = Math.round(performance.now() - start);
      if (response.status >= 200 && response.status < 300) {
        this.log.info({ channel, status: response.status, durationMs }, 'Alert delivered');
      } else {
        this.log.error({ channel, status: response.status, durationMs }, 'Alert delivery rejected');
      }
      return response.status;
    } catch (error) {
      this.log.error({ err: error, channel }, 'Alert delivery failed');
      return null;
    }
  }
}
