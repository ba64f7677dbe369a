/**
 * Slack incoming-webhook sink
 *
 * Light switches and recording problems are posted as `{ text }`. A post
 * that fails joins a bounded retry queue; the queue head is retried on a
 * timer whose delay doubles per failure (capped at a minute). The oldest
 * queued message is dropped when the queue is full.
 */

import type { HttpPost, SinkReport, SlackSink, SlackSinkConfig, TimerAPI } from '../types';

const MAX_BACKOFF_MS = 60000;
const PREVIEW_LENGTH = 50;

interface QueuedPost {
  text: string;
  attempts: number;
}

/**
 * POST a JSON body with fetch
 * @param url - Target URL
 * @param body - Serialized JSON body
 * @returns Response status summary
 */
export async function postJson(url: string, body: string): Promise<{ ok: boolean; status: number }> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body
  });
  return { ok: response.ok, status: response.status };
}

/**
 * Create a Slack sink
 *
 * @param httpPost - POST implementation (postJson in production)
 * @param timerApi - Schedules retries
 * @param config - Webhook, queue length and retry policy
 * @returns Slack sink
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(postJson, nodeTimer, {
 *   enabled: true,
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL ?? null,
 *   bufferSize: 10,
 *   retryDelayMs: 30000,
 *   maxRetries: 5
 * });
 * ```
 */
export function createSlackSink(
  httpPost: HttpPost,
  timerApi: TimerAPI,
  config: SlackSinkConfig
): SlackSink {
  const { webhookUrl } = config;
  const queue: QueuedPost[] = [];
  let backoffMs = config.retryDelayMs;
  let retryArmed = false;

  /** Resolves true on a 2xx answer; never rejects */
  async function deliver(url: string, text: string): Promise<boolean> {
    try {
      const response = await httpPost(url, JSON.stringify({ text }));
      if (!response.ok) {
        console.warn('Slack send failed: HTTP ' + response.status);
      }
      return response.ok;
    } catch (err) {
      console.warn('Slack send exception: ' + String(err));
      return false;
    }
  }

  function armRetry(url: string): void {
    retryArmed = true;
    timerApi.set(backoffMs, false, function() {
      void retryHead(url);
    });
  }

  function settle(url: string): void {
    if (queue.length > 0) {
      armRetry(url);
    } else {
      retryArmed = false;
    }
  }

  async function retryHead(url: string): Promise<void> {
    const head = queue[0];
    if (head === undefined) {
      retryArmed = false;
      backoffMs = config.retryDelayMs;
      return;
    }

    if (await deliver(url, head.text)) {
      queue.shift();
      backoffMs = config.retryDelayMs;
      if (queue.length > 0) {
        await retryHead(url);
      } else {
        retryArmed = false;
      }
      return;
    }

    head.attempts++;
    if (head.attempts >= config.maxRetries) {
      console.warn('Slack message dropped after ' + config.maxRetries + ' retries');
      queue.shift();
      backoffMs = config.retryDelayMs;
    } else {
      backoffMs = Math.min(backoffMs * 2, MAX_BACKOFF_MS);
    }
    settle(url);
  }

  function requeue(url: string, text: string): void {
    if (queue.length >= config.bufferSize) {
      const dropped = queue.shift();
      console.warn('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, PREVIEW_LENGTH) : ''));
    }
    queue.push({ text, attempts: 0 });
    if (!retryArmed) {
      armRetry(url);
    }
  }

  function initialize(): Promise<SinkReport> {
    if (!config.enabled) {
      return Promise.resolve({ sink: 'slack', ok: true, message: 'Slack disabled' });
    }
    if (webhookUrl === null) {
      return Promise.resolve({ sink: 'slack', ok: false, message: 'Slack enabled but SLACK_WEBHOOK_URL is not set' });
    }
    return Promise.resolve({ sink: 'slack', ok: true, message: 'Slack webhook configured' });
  }

  function write(line: string): void {
    if (!config.enabled || webhookUrl === null) {
      return;
    }
    void deliver(webhookUrl, line).then(function(sent) {
      if (!sent) {
        requeue(webhookUrl, line);
      }
    });
  }

  return {
    name: 'slack',
    write,
    initialize,
    getBufferSize: function() { return queue.length; }
  };
}
