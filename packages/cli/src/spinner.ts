/**
 * Run spinner for the CLI.
 *
 * Wraps an `ora` spinner and rewrites its text as the orchestrator moves
 * from stage to stage.
 */

import ora, { type Ora } from 'ora';
import type { RunState } from '@gitbrief/core';
import type { StateChange } from '@gitbrief/report';

const FRAMES = ['▱▱▱', '▰▱▱', '▰▰▱', '▰▰▰', '▱▰▰', '▱▱▰'];

/** What the spinner says while a run is in each state */
export const STAGE_TEXT: Record<RunState, string> = {
  idle: 'Starting',
  fetching: 'Reading commits',
  filtering: 'Filtering noise files',
  mapping: 'Summarising commits',
  reducing: 'Writing the daily summary',
  distilling: 'Updating project memory',
  hooking: 'Running hooks',
  rendering: 'Rendering reports',
  notifying: 'Delivering',
  done: 'Done',
  failed: 'Failed',
};

export interface RunSpinnerOptions {
  /** Plain dots for terminals without Unicode block characters */
  asciiOnly?: boolean;
}

export function createRunSpinner(opts: RunSpinnerOptions = {}): Ora {
  return ora({
    text: '',
    spinner: {
      interval: 120,
      frames: opts.asciiOnly ? ['.  ', '.. ', '...', ' ..', '  .', '   '] : FRAMES,
    },
    color: 'cyan',
  });
}

/** A state listener that keeps the spinner text current */
export function followStages(spinner: Ora): (change: StateChange) => void {
  return (change) => {
    spinner.text = `${change.project}: ${STAGE_TEXT[change.to]}`;
  };
}
