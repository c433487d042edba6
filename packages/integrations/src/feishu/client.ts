/**
 * Minimal Feishu (Lark) open-platform client.
 * Covers the four calls report delivery needs: tenant token, file
 * upload, direct message by email and the group webhook.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

// ─── Response Schemas ─────────────────────────────────────────────

const baseResponseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
});

const tokenResponseSchema = baseResponseSchema.extend({
  tenant_access_token: z.string().optional(),
});

const uploadResponseSchema = baseResponseSchema.extend({
  data: z.object({ file_key: z.string() }).optional(),
});

const messageResponseSchema = baseResponseSchema.extend({
  data: z.object({ message_id: z.string() }).optional(),
});

/** Custom-bot webhooks answer either `{code}` or the legacy `{StatusCode}` */
const webhookResponseSchema = z.object({
  code: z.number().optional(),
  msg: z.string().optional(),
  StatusCode: z.number().optional(),
  StatusMessage: z.string().optional(),
});

// ─── Types ────────────────────────────────────────────────────────

export type FetchFn = typeof fetch;

export interface FeishuClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

export type FeishuMessage =
  | { msgType: 'text'; text: string }
  | { msgType: 'file'; fileKey: string };

export class FeishuApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly apiCode: number | null,
    message: string,
  ) {
    super(`${endpoint}: ${message}`);
    this.name = 'FeishuApiError';
  }
}

// ─── Client ───────────────────────────────────────────────────────

export class FeishuClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(opts: FeishuClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs;
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  async getTenantToken(appId: string, appSecret: string): Promise<string> {
    const endpoint = '/open-apis/auth/v3/tenant_access_token/internal';
    const body = await this.request(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ app_id: appId, app_secret: appSecret }),
    });
    const parsed = expectOk(endpoint, tokenResponseSchema.safeParse(body));
    if (!parsed.tenant_access_token) {
      throw new FeishuApiError(endpoint, parsed.code, 'response carried no tenant_access_token');
    }
    return parsed.tenant_access_token;
  }

  /** Upload a file for later sending; returns its file_key */
  async uploadFile(token: string, filePath: string): Promise<string> {
    const endpoint = '/open-apis/im/v1/files';
    const fileName = path.basename(filePath);
    const content = await fs.readFile(filePath);

    const form = new FormData();
    form.append('file_type', fileName.toLowerCase().endsWith('.pdf') ? 'pdf' : 'stream');
    form.append('file_name', fileName);
    form.append('file', new Blob([content]), fileName);

    const body = await this.request(endpoint, {
      method: 'POST',
      headers: { Authorization: `Bearer ${token}` },
      body: form,
    });
    const parsed = expectOk(endpoint, uploadResponseSchema.safeParse(body));
    if (!parsed.data) {
      throw new FeishuApiError(endpoint, parsed.code, 'response carried no file_key');
    }
    return parsed.data.file_key;
  }

  /** Send a direct message to the user registered under `email` */
  async sendMessage(token: string, email: string, message: FeishuMessage): Promise<string> {
    const endpoint = '/open-apis/im/v1/messages';
    const content =
      message.msgType === 'text' ? { text: message.text } : { file_key: message.fileKey };

    const body = await this.request(`${endpoint}?receive_id_type=email`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      },
      // content must itself be a JSON string
      body: JSON.stringify({
        receive_id: email,
        msg_type: message.msgType,
        content: JSON.stringify(content),
      }),
    });
    const parsed = expectOk(endpoint, messageResponseSchema.safeParse(body));
    return parsed.data?.message_id ?? '';
  }

  async sendWebhookText(webhookUrl: string, text: string): Promise<void> {
    const endpoint = 'webhook';
    const body = await this.request(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ msg_type: 'text', content: { text } }),
    });

    const result = webhookResponseSchema.safeParse(body);
    if (!result.success) {
      throw new FeishuApiError(endpoint, null, 'unexpected response shape');
    }
    const code = result.data.code ?? result.data.StatusCode;
    if (code !== 0) {
      throw new FeishuApiError(
        endpoint,
        code ?? null,
        result.data.msg ?? result.data.StatusMessage ?? 'webhook rejected the message',
      );
    }
  }

  private async request(target: string, init: RequestInit): Promise<unknown> {
    const url = /^https?:\/\//.test(target) ? target : `${this.baseUrl}${target}`;
    const response = await this.fetchFn(url, {
      ...init,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new FeishuApiError(target, null, `HTTP ${response.status}, non-JSON body`);
    }
  }
}

function expectOk<T extends { code: number; msg?: string }>(
  endpoint: string,
  result: { success: true; data: T } | { success: false },
): T {
  if (!result.success) {
    throw new FeishuApiError(endpoint, null, 'unexpected response shape');
  }
  if (result.data.code !== 0) {
    throw new FeishuApiError(endpoint, result.data.code, result.data.msg ?? `error code ${result.data.code}`);
  }
  return result.data;
}
