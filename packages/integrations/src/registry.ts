/**
 * Notification channel registry.
 * Maps channel names from `notify.channels` to notifier factories.
 * Credentials come from the environment variables the config names.
 */

import { UnknownNotifierError, type GitBriefConfig, type Notifier } from '@gitbrief/core';
import type { Env } from './delivery.js';
import { EmailNotifier } from './email/notifier.js';
import { FeishuClient, type FetchFn } from './feishu/client.js';
import { FeishuNotifier } from './feishu/notifier.js';
import { SlackNotifier } from './slack/notifier.js';

export type NotifierFactory = (config: GitBriefConfig, env: Env) => Notifier;

export class NotifierRegistry {
  private readonly factories = new Map<string, NotifierFactory>();

  register(name: string, factory: NotifierFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  /** Throws UnknownNotifierError for an unregistered name */
  create(name: string, config: GitBriefConfig, env: Env): Notifier {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownNotifierError(name, this.names());
    }
    return factory(config, env);
  }

  /** Build every configured channel; fails on the first unknown name before anything is sent */
  createAll(names: readonly string[], config: GitBriefConfig, env: Env): Notifier[] {
    const unknown = names.find((name) => !this.factories.has(name));
    if (unknown !== undefined) {
      throw new UnknownNotifierError(unknown, this.names());
    }
    return names.map((name) => this.create(name, config, env));
  }
}

export interface DefaultNotifierOptions {
  /** Transport override for the Feishu client */
  fetchFn?: FetchFn;
}

export function createDefaultNotifierRegistry(opts: DefaultNotifierOptions = {}): NotifierRegistry {
  return new NotifierRegistry()
    .register('email', (config, env) => {
      const { email } = config.notify;
      return new EmailNotifier({
        apiKey: env[email.apiKeyEnv],
        apiKeyEnv: email.apiKeyEnv,
        from: email.from,
      });
    })
    .register('slack', (config, env) => {
      const { slack } = config.notify;
      return new SlackNotifier({
        token: env[slack.botTokenEnv],
        tokenEnv: slack.botTokenEnv,
        channel: slack.channel,
      });
    })
    .register('feishu', (config, env) => {
      const { feishu, timeoutMs } = config.notify;
      return new FeishuNotifier({
        appId: env[feishu.appIdEnv],
        appSecret: env[feishu.appSecretEnv],
        webhookUrl: env[feishu.webhookEnv],
        client: new FeishuClient({ baseUrl: feishu.baseUrl, timeoutMs, fetchFn: opts.fetchFn }),
      });
    });
}
