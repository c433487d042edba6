/**
 * Slack Block Kit message builders for report delivery.
 */

import * as path from 'node:path';
import type { KnownBlock } from '@slack/web-api';
import type { DeliveryArtifact } from '@gitbrief/core';

/** Complete Slack message payload */
export interface SlackMessage {
  text: string;
  blocks: KnownBlock[];
}

/** Section text is capped by Slack at 3000 characters */
export const MAX_SECTION_CHARS = 2900;

/**
 * Build Slack blocks for a report message: header, stats fields,
 * the summary (or text report in no-AI runs) and a context line naming
 * the generated files.
 */
export function buildReportBlocks(artifact: DeliveryArtifact): SlackMessage {
  const { stats } = artifact;
  const blocks: KnownBlock[] = [
    {
      type: 'header',
      text: { type: 'plain_text', text: `:memo: ${artifact.subject}`, emoji: true },
    },
    {
      type: 'section',
      fields: [
        { type: 'mrkdwn', text: `*Project:*\n${artifact.project}` },
        { type: 'mrkdwn', text: `*Date:*\n${artifact.date}` },
        { type: 'mrkdwn', text: `*Commits:*\n${stats.commits}` },
        { type: 'mrkdwn', text: `*Lines:*\n+${stats.additions} / -${stats.deletions}` },
      ],
    },
    { type: 'divider' },
    {
      type: 'section',
      text: { type: 'mrkdwn', text: truncateSection(artifact.summary ?? artifact.textReport) },
    },
  ];

  if (artifact.files.length > 0) {
    blocks.push({
      type: 'context',
      elements: [
        {
          type: 'mrkdwn',
          text: `Generated: ${artifact.files.map((f) => path.basename(f.path)).join(', ')}`,
        },
      ],
    });
  }

  return {
    text: `${artifact.subject} - ${stats.commits} commit(s)`,
    blocks,
  };
}

export function truncateSection(content: string): string {
  return content.length > MAX_SECTION_CHARS
    ? content.slice(0, MAX_SECTION_CHARS) + '\n\n_... (truncated)_'
    : content;
}
