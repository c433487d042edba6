/**
 * Hook manager: ordered extension points around the pipeline.
 *
 * Each hook receives its own copy of the payload and returns the payload
 * for the next hook. A hook that throws is skipped: the previous payload
 * carries on and a HOOK_FAILED diagnostic is recorded.
 */

import { describeError, type Diagnostic, type Logger, type RunStage } from '@gitbrief/core';
import type { ReportModel } from '../renderer/model.js';

export type HookPoint = 'post-map' | 'post-reduce' | 'pre-render' | 'post-render';

export interface HookPayloads {
  /** Map lines, oldest commit first */
  'post-map': string[];
  /** Daily summary markdown */
  'post-reduce': string;
  'pre-render': ReportModel;
  /** Rendered HTML document */
  'post-render': string;
}

export interface HookContext {
  project: string;
  logger: Logger;
}

export interface Hook<P extends HookPoint> {
  name: string;
  run(payload: HookPayloads[P], ctx: HookContext): HookPayloads[P] | Promise<HookPayloads[P]>;
}

type HookTable = { [P in HookPoint]: Array<Hook<P>> };

const STAGE_OF: Record<HookPoint, RunStage> = {
  'post-map': 'mapping',
  'post-reduce': 'reducing',
  'pre-render': 'hooking',
  'post-render': 'rendering',
};

export interface HookRunResult<T> {
  payload: T;
  diagnostics: Diagnostic[];
}

export class HookManager {
  private readonly table: HookTable = {
    'post-map': [],
    'post-reduce': [],
    'pre-render': [],
    'post-render': [],
  };

  register<P extends HookPoint>(point: P, hook: Hook<P>): this {
    const hooks: Array<Hook<P>> = this.table[point];
    hooks.push(hook);
    return this;
  }

  /** Hook names registered at a point, in run order */
  list(point: HookPoint): string[] {
    return this.table[point].map((h) => h.name);
  }

  async run<P extends HookPoint>(
    point: P,
    payload: HookPayloads[P],
    ctx: HookContext,
  ): Promise<HookRunResult<HookPayloads[P]>> {
    const hooks: Array<Hook<P>> = this.table[point];
    const diagnostics: Diagnostic[] = [];
    let current = payload;

    for (const hook of hooks) {
      try {
        current = await hook.run(structuredClone(current), ctx);
      } catch (error) {
        const message = `Hook "${hook.name}" at ${point} failed: ${describeError(error)}`;
        ctx.logger.warn('hooks', message);
        diagnostics.push({ code: 'HOOK_FAILED', stage: STAGE_OF[point], message });
      }
    }

    return { payload: current, diagnostics };
  }
}
