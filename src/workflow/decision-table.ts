import { DuplicateContentRejected } from '../errors.js';
import type { NextHint, RunState } from '../types/workflow.js';

export interface SupervisorPolicy {
  /** Consecutive duplicate verdicts after which the run is rejected. */
  maxDuplicateVerdicts: number;
}

/**
 * Hints the supervisor may legally return for `state`, the table's own
 * choice first. Rows are evaluated top to bottom.
 *
 * Throws DuplicateContentRejected once the redraft budget is spent.
 */
export function legalHints(state: RunState, policy: SupervisorPolicy): NextHint[] {
  if (state.publication) return ['finish'];
  if (state.toolResults.some((r) => r.requestedBy === 'researcher')) return ['research'];
  if (state.researchFindings.length === 0) return ['research'];
  if (!state.draft) return ['write', 'research'];

  switch (state.qualityVerdict) {
    case 'unchecked':
      return ['check'];
    case 'unique':
      return ['publish'];
    case 'duplicate':
      if (state.consecutiveDuplicates >= policy.maxDuplicateVerdicts) {
        throw new DuplicateContentRejected(
          `Draft rejected as duplicate ${state.consecutiveDuplicates} times in a row (limit ${policy.maxDuplicateVerdicts})`,
        );
      }
      return ['write', 'research'];
  }
}

/** The table's decision: the first legal hint. */
export function decide(state: RunState, policy: SupervisorPolicy): NextHint {
  return legalHints(state, policy)[0];
}
