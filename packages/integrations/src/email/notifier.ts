/**
 * Email delivery through Resend.
 *
 * One message per recipient so a rejected address does not hide the
 * outcome for the others. The HTML report, when present, becomes the
 * message body; every artifact file is attached.
 */

import * as fs from 'node:fs/promises';
import { Resend } from 'resend';
import {
  describeError,
  type DeliveryArtifact,
  type DeliveryResult,
  type Notifier,
  type RecipientResult,
} from '@gitbrief/core';
import {
  deliveryFailure,
  deliveryResult,
  escapeHtml,
  loadAttachments,
  type LoadedAttachment,
} from '../delivery.js';

// ─── Types ────────────────────────────────────────────────────────

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  html: string;
  text: string;
  attachments: LoadedAttachment[];
}

/** Transport seam; the default implementation talks to Resend */
export interface MailClient {
  send(message: MailMessage): Promise<{ id: string }>;
}

export interface EmailNotifierOptions {
  apiKey?: string;
  apiKeyEnv: string;
  from?: string;
  /** Injected transport; built from the API key when omitted */
  client?: MailClient;
}

// ─── Transport ────────────────────────────────────────────────────

export function createResendMailClient(apiKey: string): MailClient {
  const resend = new Resend(apiKey);
  return {
    async send(message) {
      const { data, error } = await resend.emails.send({
        from: message.from,
        to: [message.to],
        subject: message.subject,
        html: message.html,
        text: message.text,
        attachments: message.attachments.map((a) => ({ filename: a.filename, content: a.content })),
      });
      if (error) {
        throw new Error(error.message);
      }
      return { id: data?.id ?? '' };
    },
  };
}

// ─── Notifier ─────────────────────────────────────────────────────

export class EmailNotifier implements Notifier {
  readonly name = 'email';
  private readonly opts: EmailNotifierOptions;

  constructor(opts: EmailNotifierOptions) {
    this.opts = opts;
  }

  isEnabled(): boolean {
    return this.missingSettings().length === 0;
  }

  missingSettings(): string[] {
    const missing: string[] = [];
    if (!this.opts.client && !this.opts.apiKey) missing.push(this.opts.apiKeyEnv);
    if (!this.opts.from) missing.push('notify.email.from');
    return missing;
  }

  async deliver(artifact: DeliveryArtifact, recipients: readonly string[]): Promise<DeliveryResult> {
    const missing = this.missingSettings();
    if (missing.length > 0) {
      return deliveryFailure(this.name, recipients, `not configured: missing ${missing.join(', ')}`);
    }
    if (recipients.length === 0) {
      return deliveryResult(this.name, {});
    }

    const client = this.opts.client ?? createResendMailClient(this.opts.apiKey ?? '');
    const from = this.opts.from ?? '';

    let attachments: LoadedAttachment[];
    let html: string;
    try {
      attachments = await loadAttachments(artifact.files);
      html = await this.buildHtmlBody(artifact);
    } catch (error) {
      return deliveryFailure(this.name, recipients, `could not read artifacts: ${describeError(error)}`);
    }

    const results: Record<string, RecipientResult> = {};
    for (const to of recipients) {
      try {
        const { id } = await client.send({
          from,
          to,
          subject: artifact.subject,
          html,
          text: artifact.summary ?? artifact.textReport,
          attachments,
        });
        results[to] = { ok: true, messageId: id };
      } catch (error) {
        results[to] = { ok: false, error: describeError(error) };
      }
    }

    return deliveryResult(this.name, results);
  }

  private async buildHtmlBody(artifact: DeliveryArtifact): Promise<string> {
    const htmlReport = artifact.files.find((f) => f.kind === 'html');
    if (htmlReport) {
      return fs.readFile(htmlReport.path, 'utf-8');
    }
    return `<pre>${escapeHtml(artifact.summary ?? artifact.textReport)}</pre>`;
  }
}
