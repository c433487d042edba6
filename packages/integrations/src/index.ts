/**
 * @gitbrief/integrations - GitHub commit source, delivery channels and PDF export.
 */

// ─── GitHub ───────────────────────────────────────────────────────

export {
  createGitHubClient,
  createOctokitCommitApi,
  parseRepoUrl,
  buildDiffFromFiles,
  type GitHubClientOptions,
  type GitHubCommitApi,
  type RepoRef,
  type RemoteCommit,
  type RemoteCommitFile,
} from './github/api.js';

export {
  GitHubCommitSource,
  createGitHubCommitSource,
  parseSincePhrase,
  type GitHubCommitSourceOptions,
} from './github/commit-source.js';

// ─── Delivery ─────────────────────────────────────────────────────

export { deliveryFailure, deliveryResult, escapeHtml, type Env } from './delivery.js';

export {
  EmailNotifier,
  createResendMailClient,
  type EmailNotifierOptions,
  type MailClient,
  type MailMessage,
} from './email/notifier.js';

export { SlackNotifier, type SlackNotifierOptions, type SlackPoster } from './slack/notifier.js';
export { buildReportBlocks, type SlackMessage } from './slack/blocks.js';

export {
  FeishuClient,
  FeishuApiError,
  type FeishuClientOptions,
  type FeishuMessage,
  type FetchFn,
} from './feishu/client.js';
export { FeishuNotifier, type FeishuMode, type FeishuNotifierOptions } from './feishu/notifier.js';

export {
  NotifierRegistry,
  createDefaultNotifierRegistry,
  type DefaultNotifierOptions,
  type NotifierFactory,
} from './registry.js';

// ─── Export ───────────────────────────────────────────────────────

export { PrinceExporter, PdfExportError, type PrinceExporterOptions } from './pdf/prince.js';
