/**
 * Helpers shared by the delivery channels.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ArtifactFile, DeliveryResult, RecipientResult } from '@gitbrief/core';

/** Environment lookup used to resolve credentials */
export type Env = Readonly<Record<string, string | undefined>>;

/** A result where every recipient failed for the same reason */
export function deliveryFailure(
  channel: string,
  recipients: readonly string[],
  error: string,
  mode?: string,
): DeliveryResult {
  const results: Record<string, RecipientResult> = {};
  for (const recipient of recipients) {
    results[recipient] = { ok: false, error };
  }
  return { channel, ok: false, recipients: results, error, ...(mode ? { mode } : {}) };
}

/** Fold per-recipient results into a channel result; ok only when every recipient succeeded */
export function deliveryResult(
  channel: string,
  results: Record<string, RecipientResult>,
  mode?: string,
): DeliveryResult {
  const failed = Object.entries(results).filter(([, r]) => !r.ok);
  const ok = Object.keys(results).length > 0 && failed.length === 0;
  return {
    channel,
    ok,
    recipients: results,
    ...(mode ? { mode } : {}),
    ...(ok ? {} : { error: failed.length > 0 ? `${failed.length} recipient(s) failed` : 'no recipients' }),
  };
}

export interface LoadedAttachment {
  filename: string;
  content: Buffer;
}

/** Read artifact files for attaching */
export async function loadAttachments(files: readonly ArtifactFile[]): Promise<LoadedAttachment[]> {
  return Promise.all(
    files.map(async (file) => ({
      filename: path.basename(file.path),
      content: await fs.readFile(file.path),
    })),
  );
}

/** Escape text for inclusion in an HTML body */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
