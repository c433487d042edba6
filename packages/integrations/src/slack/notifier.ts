/**
 * Slack delivery.
 * Posts the report to the configured channel with the bot token. The
 * channel, not the recipient list, decides where the message lands, so
 * the result is keyed by channel.
 */

import { WebClient, type KnownBlock } from '@slack/web-api';
import {
  describeError,
  type DeliveryArtifact,
  type DeliveryResult,
  type Notifier,
} from '@gitbrief/core';
import { deliveryFailure, deliveryResult } from '../delivery.js';
import { buildReportBlocks } from './blocks.js';

/** The part of WebClient the notifier calls */
export interface SlackPoster {
  chat: {
    postMessage(args: {
      channel: string;
      text: string;
      blocks: KnownBlock[];
    }): Promise<{ ok: boolean; ts?: string; error?: string }>;
  };
}

export interface SlackNotifierOptions {
  token?: string;
  tokenEnv: string;
  channel?: string;
  client?: SlackPoster;
}

export class SlackNotifier implements Notifier {
  readonly name = 'slack';
  private readonly opts: SlackNotifierOptions;

  constructor(opts: SlackNotifierOptions) {
    this.opts = opts;
  }

  isEnabled(): boolean {
    return this.missingSettings().length === 0;
  }

  missingSettings(): string[] {
    const missing: string[] = [];
    if (!this.opts.client && !this.opts.token) missing.push(this.opts.tokenEnv);
    if (!this.opts.channel) missing.push('notify.slack.channel');
    return missing;
  }

  async deliver(artifact: DeliveryArtifact, _recipients: readonly string[]): Promise<DeliveryResult> {
    const channel = this.opts.channel ?? '';
    const missing = this.missingSettings();
    if (missing.length > 0) {
      return deliveryFailure(this.name, channel ? [channel] : [], `not configured: missing ${missing.join(', ')}`);
    }

    const client = this.opts.client ?? new WebClient(this.opts.token);
    const message = buildReportBlocks(artifact);

    try {
      const response = await client.chat.postMessage({
        channel,
        text: message.text,
        blocks: message.blocks,
      });
      if (!response.ok) {
        return deliveryResult(this.name, {
          [channel]: { ok: false, error: response.error ?? 'unknown Slack error' },
        });
      }
      return deliveryResult(this.name, {
        [channel]: { ok: true, ...(response.ts ? { messageId: response.ts } : {}) },
      });
    } catch (error) {
      return deliveryResult(this.name, { [channel]: { ok: false, error: describeError(error) } });
    }
  }
}
