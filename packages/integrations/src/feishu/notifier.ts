/**
 * Feishu (Lark) delivery.
 *
 * App mode (app id + secret) uploads the primary document and messages
 * each recipient directly, matched by email. Without app credentials the
 * notifier falls back to posting a text summary to the group webhook.
 */

import {
  describeError,
  getLogger,
  type DeliveryArtifact,
  type DeliveryResult,
  type Notifier,
  type RecipientResult,
} from '@gitbrief/core';
import { deliveryFailure, deliveryResult } from '../delivery.js';
import { FeishuClient } from './client.js';

export type FeishuMode = 'app' | 'webhook' | 'disabled';

export interface FeishuNotifierOptions {
  appId?: string;
  appSecret?: string;
  webhookUrl?: string;
  client: FeishuClient;
}

const WEBHOOK_RECIPIENT = 'webhook';

export class FeishuNotifier implements Notifier {
  readonly name = 'feishu';
  private readonly opts: FeishuNotifierOptions;

  constructor(opts: FeishuNotifierOptions) {
    this.opts = opts;
  }

  get mode(): FeishuMode {
    if (this.opts.appId && this.opts.appSecret) return 'app';
    if (this.opts.webhookUrl) return 'webhook';
    return 'disabled';
  }

  isEnabled(): boolean {
    return this.mode !== 'disabled';
  }

  async deliver(artifact: DeliveryArtifact, recipients: readonly string[]): Promise<DeliveryResult> {
    switch (this.mode) {
      case 'app':
        return this.deliverViaApp(artifact, recipients);
      case 'webhook':
        return this.deliverViaWebhook(artifact);
      case 'disabled':
        return deliveryFailure(
          this.name,
          recipients,
          'not configured: neither app credentials nor a webhook URL is set',
        );
    }
  }

  private async deliverViaApp(
    artifact: DeliveryArtifact,
    recipients: readonly string[],
  ): Promise<DeliveryResult> {
    const { client } = this.opts;
    if (recipients.length === 0) {
      return deliveryResult(this.name, {}, 'app');
    }

    let token: string;
    try {
      token = await client.getTenantToken(this.opts.appId ?? '', this.opts.appSecret ?? '');
    } catch (error) {
      return deliveryFailure(this.name, recipients, `token request failed: ${describeError(error)}`, 'app');
    }

    let fileKey: string | null = null;
    const primary = artifact.files[0];
    if (primary) {
      try {
        fileKey = await client.uploadFile(token, primary.path);
      } catch (error) {
        // The text message still goes out without the document
        getLogger().warn('feishu', `Upload failed, sending text only: ${describeError(error)}`);
      }
    }

    const text = `${artifact.subject}\n\n${artifact.summary ?? artifact.textReport}`;
    const results: Record<string, RecipientResult> = {};
    for (const email of recipients) {
      try {
        const messageId = await client.sendMessage(token, email, { msgType: 'text', text });
        if (fileKey) {
          await client.sendMessage(token, email, { msgType: 'file', fileKey });
        }
        results[email] = { ok: true, ...(messageId ? { messageId } : {}) };
      } catch (error) {
        results[email] = { ok: false, error: describeError(error) };
      }
    }

    return deliveryResult(this.name, results, 'app');
  }

  private async deliverViaWebhook(artifact: DeliveryArtifact): Promise<DeliveryResult> {
    const text = `【${artifact.subject}】\n\n${artifact.summary ?? artifact.textReport}`;
    try {
      await this.opts.client.sendWebhookText(this.opts.webhookUrl ?? '', text);
      return deliveryResult(this.name, { [WEBHOOK_RECIPIENT]: { ok: true } }, 'webhook');
    } catch (error) {
      return deliveryResult(
        this.name,
        { [WEBHOOK_RECIPIENT]: { ok: false, error: describeError(error) } },
        'webhook',
      );
    }
  }
}
