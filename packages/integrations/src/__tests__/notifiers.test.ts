import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { getDefaultConfig, UnknownNotifierError, type DeliveryArtifact } from '@gitbrief/core';
import { EmailNotifier, type MailClient, type MailMessage } from '../email/notifier.js';
import { FeishuClient } from '../feishu/client.js';
import { FeishuNotifier } from '../feishu/notifier.js';
import { SlackNotifier } from '../slack/notifier.js';
import { buildReportBlocks, truncateSection } from '../slack/blocks.js';
import { createDefaultNotifierRegistry } from '../registry.js';

function makeArtifact(overrides: Partial<DeliveryArtifact> = {}): DeliveryArtifact {
  return {
    project: 'widgets',
    date: '2024-05-10',
    subject: 'Daily report: widgets',
    stats: { commits: 3, filesChanged: 4, additions: 120, deletions: 30 },
    summary: 'Shipped the widget endpoint.',
    textReport: 'plain text report',
    files: [],
    ...overrides,
  };
}

type Handler = (url: string, body: unknown) => unknown;

/** A fetch stand-in that answers JSON from a handler */
function stubFetch(handler: Handler) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = String(input);
    const raw = init?.body;
    const body: unknown = typeof raw === 'string' ? JSON.parse(raw) : null;
    return new Response(JSON.stringify(handler(url, body)));
  });
}

// ─── Email ────────────────────────────────────────────────────────

describe('EmailNotifier', () => {
  it('reports missing settings without sending', async () => {
    const notifier = new EmailNotifier({ apiKeyEnv: 'RESEND_API_KEY' });

    expect(notifier.isEnabled()).toBe(false);
    const result = await notifier.deliver(makeArtifact(), ['dev@example.com']);

    expect(result).toEqual({
      channel: 'email',
      ok: false,
      recipients: {
        'dev@example.com': { ok: false, error: 'not configured: missing RESEND_API_KEY, notify.email.from' },
      },
      error: 'not configured: missing RESEND_API_KEY, notify.email.from',
    });
  });

  it('sends one message per recipient and keeps failures separate', async () => {
    const sent: MailMessage[] = [];
    const client: MailClient = {
      async send(message) {
        if (message.to === 'bad@example.com') throw new Error('mailbox unavailable');
        sent.push(message);
        return { id: `msg-${sent.length}` };
      },
    };
    const notifier = new EmailNotifier({
      apiKeyEnv: 'RESEND_API_KEY',
      from: 'reports@example.com',
      client,
    });

    const result = await notifier.deliver(
      makeArtifact({ summary: 'a < b' }),
      ['good@example.com', 'bad@example.com'],
    );

    expect(result).toEqual({
      channel: 'email',
      ok: false,
      recipients: {
        'good@example.com': { ok: true, messageId: 'msg-1' },
        'bad@example.com': { ok: false, error: 'mailbox unavailable' },
      },
      error: '1 recipient(s) failed',
    });
    expect(sent[0].html).toBe('<pre>a &lt; b</pre>');
    expect(sent[0].subject).toBe('Daily report: widgets');
  });
});

// ─── Slack ────────────────────────────────────────────────────────

describe('SlackNotifier', () => {
  it('posts to the configured channel', async () => {
    const postMessage = vi.fn(async () => ({ ok: true, ts: '1715.001' }));
    const notifier = new SlackNotifier({ tokenEnv: 'SLACK_BOT_TOKEN', channel: '#dev', client: { chat: { postMessage } } });

    const result = await notifier.deliver(makeArtifact(), ['dev@example.com']);

    expect(result).toEqual({
      channel: 'slack',
      ok: true,
      recipients: { '#dev': { ok: true, messageId: '1715.001' } },
    });
    expect(postMessage).toHaveBeenCalledTimes(1);
  });

  it('fails without a channel', async () => {
    const notifier = new SlackNotifier({ tokenEnv: 'SLACK_BOT_TOKEN', token: 'test-token' });

    const result = await notifier.deliver(makeArtifact(), []);

    expect(result.ok).toBe(false);
    expect(result.error).toBe('not configured: missing notify.slack.channel');
  });

  it('builds blocks from the artifact', () => {
    const message = buildReportBlocks(makeArtifact({ files: [{ kind: 'html', path: '/tmp/out/GitReport_1.html' }] }));

    expect(message.text).toBe('Daily report: widgets - 3 commit(s)');
    expect(message.blocks.map((b) => b.type)).toEqual(['header', 'section', 'divider', 'section', 'context']);
  });

  it('truncates long sections', () => {
    const text = truncateSection('x'.repeat(3000));
    expect(text).toBe('x'.repeat(2900) + '\n\n_... (truncated)_');
  });
});

// ─── Feishu ───────────────────────────────────────────────────────

describe('FeishuNotifier', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gitbrief-feishu-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('uploads the document and messages each recipient in app mode', async () => {
    const report = path.join(tmpDir, 'GitReport_20240510_180000.html');
    fs.writeFileSync(report, '<html></html>');

    const fetchFn = stubFetch((url) => {
      if (url.endsWith('/tenant_access_token/internal')) return { code: 0, tenant_access_token: 't-test' };
      if (url.endsWith('/im/v1/files')) return { code: 0, data: { file_key: 'file-1' } };
      return { code: 0, data: { message_id: 'om-1' } };
    });
    const notifier = new FeishuNotifier({
      appId: 'cli-test',
      appSecret: 'test-secret',
      client: new FeishuClient({ baseUrl: 'https://open.feishu.test', timeoutMs: 1000, fetchFn }),
    });

    const result = await notifier.deliver(makeArtifact({ files: [{ kind: 'html', path: report }] }), [
      'a@example.com',
      'b@example.com',
    ]);

    expect(notifier.mode).toBe('app');
    expect(result).toEqual({
      channel: 'feishu',
      ok: true,
      mode: 'app',
      recipients: {
        'a@example.com': { ok: true, messageId: 'om-1' },
        'b@example.com': { ok: true, messageId: 'om-1' },
      },
    });
    // token, upload, then text + file for each recipient
    expect(fetchFn).toHaveBeenCalledTimes(6);

    const [messageUrl, messageInit] = fetchFn.mock.calls[2];
    expect(String(messageUrl)).toBe('https://open.feishu.test/open-apis/im/v1/messages?receive_id_type=email');
    expect(JSON.parse(String(messageInit?.body))).toEqual({
      receive_id: 'a@example.com',
      msg_type: 'text',
      content: JSON.stringify({ text: 'Daily report: widgets\n\nShipped the widget endpoint.' }),
    });
  });

  it('fails every recipient when the token request is rejected', async () => {
    const fetchFn = stubFetch(() => ({ code: 10003, msg: 'invalid app' }));
    const notifier = new FeishuNotifier({
      appId: 'cli-test',
      appSecret: 'test-secret',
      client: new FeishuClient({ baseUrl: 'https://open.feishu.test', timeoutMs: 1000, fetchFn }),
    });

    const result = await notifier.deliver(makeArtifact(), ['a@example.com']);

    const reason = 'token request failed: /open-apis/auth/v3/tenant_access_token/internal: invalid app';
    expect(result).toEqual({
      channel: 'feishu',
      ok: false,
      mode: 'app',
      recipients: { 'a@example.com': { ok: false, error: reason } },
      error: reason,
    });
  });

  it('falls back to the webhook without app credentials', async () => {
    const fetchFn = stubFetch(() => ({ StatusCode: 0, StatusMessage: 'success' }));
    const notifier = new FeishuNotifier({
      webhookUrl: 'https://hooks.feishu.test/bot/v2/hook/test',
      client: new FeishuClient({ baseUrl: 'https://open.feishu.test', timeoutMs: 1000, fetchFn }),
    });

    const result = await notifier.deliver(makeArtifact(), ['a@example.com']);

    expect(result).toEqual({
      channel: 'feishu',
      ok: true,
      mode: 'webhook',
      recipients: { webhook: { ok: true } },
    });
    const [url, init] = fetchFn.mock.calls[0];
    expect(String(url)).toBe('https://hooks.feishu.test/bot/v2/hook/test');
    expect(JSON.parse(String(init?.body))).toEqual({
      msg_type: 'text',
      content: { text: '【Daily report: widgets】\n\nShipped the widget endpoint.' },
    });
  });

  it('reports a rejected webhook post', async () => {
    const fetchFn = stubFetch(() => ({ code: 19021, msg: 'sign match fail' }));
    const notifier = new FeishuNotifier({
      webhookUrl: 'https://hooks.feishu.test/bot/v2/hook/test',
      client: new FeishuClient({ baseUrl: 'https://open.feishu.test', timeoutMs: 1000, fetchFn }),
    });

    const result = await notifier.deliver(makeArtifact(), []);

    expect(result.ok).toBe(false);
    expect(result.recipients).toEqual({ webhook: { ok: false, error: 'webhook: sign match fail' } });
  });

  it('is disabled with neither credentials nor a webhook', async () => {
    const fetchFn = stubFetch(() => ({ code: 0 }));
    const notifier = new FeishuNotifier({
      client: new FeishuClient({ baseUrl: 'https://open.feishu.test', timeoutMs: 1000, fetchFn }),
    });

    const result = await notifier.deliver(makeArtifact(), ['a@example.com']);

    expect(notifier.isEnabled()).toBe(false);
    expect(result.ok).toBe(false);
    expect(result.error).toBe('not configured: neither app credentials nor a webhook URL is set');
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

// ─── Registry ─────────────────────────────────────────────────────

describe('NotifierRegistry', () => {
  it('lists the built-in channels', () => {
    expect(createDefaultNotifierRegistry().names()).toEqual(['email', 'feishu', 'slack']);
  });

  it('throws for an unknown channel before building any other', () => {
    const registry = createDefaultNotifierRegistry();
    const factory = vi.fn(() => new EmailNotifier({ apiKeyEnv: 'RESEND_API_KEY' }));
    registry.register('email', factory);

    expect(() => registry.createAll(['email', 'pager'], getDefaultConfig(), {})).toThrow(UnknownNotifierError);
    expect(factory).not.toHaveBeenCalled();
  });

  it('resolves credentials from the environment', () => {
    const notifier = createDefaultNotifierRegistry().create('feishu', getDefaultConfig(), {
      FEISHU_WEBHOOK_URL: 'https://hooks.feishu.test/bot/v2/hook/test',
    });

    expect(notifier).toBeInstanceOf(FeishuNotifier);
    expect(notifier.isEnabled()).toBe(true);
  });
});
