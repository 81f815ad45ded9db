/**
 * @fileoverview Pipeline state machine
 *
 * The sub-commands must run in order. Each stage checks its transition here
 * before any side effect and is rejected with a typed StageOrderError when
 * invoked out of order.
 */

import { StageOrderError } from '../core/errors.js';
import { STAGE_ORDER, type StageName } from '../core/types.js';

export const PIPELINE_STATES = [
  'empty',
  'acquired',
  'provisioned',
  'configured',
  'compiled',
  'verified',
  'installed',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

/**
 * Valid state transitions
 */
export const PIPELINE_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  empty: ['acquired'],
  acquired: ['provisioned'],
  provisioned: ['configured'],
  configured: ['compiled'],
  compiled: ['verified'],
  verified: ['installed'],
  installed: [], // Terminal state
};

/** State each stage moves the pipeline into when it completes. */
export const STAGE_TARGET_STATE: Record<StageName, PipelineState> = {
  acquire: 'acquired',
  provision: 'provisioned',
  configure: 'configured',
  compile: 'compiled',
  verify: 'verified',
  install: 'installed',
};

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return PIPELINE_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PipelineState, to: PipelineState): void {
  if (!canTransition(from, to)) {
    throw new StageOrderError(from, to);
  }
}

/** The stage that has to run next from `state`, or null once installed. */
export function nextStage(state: PipelineState): StageName | null {
  for (const stage of STAGE_ORDER) {
    if (canTransition(state, STAGE_TARGET_STATE[stage])) return stage;
  }
  return null;
}
