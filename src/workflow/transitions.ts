import { ConfigurationError } from '../errors.js';
import { END, type NextHint, type NextNode, type NodeName } from '../types/workflow.js';

export type TransitionTable = Readonly<Record<NodeName, Partial<Record<NextHint, NextNode>>>>;

/**
 * The only legal moves of the graph. Every agent reports back to the
 * supervisor; the run ends after a publish or when the supervisor finishes.
 */
export const DEFAULT_TRANSITIONS: TransitionTable = {
  supervisor: {
    research: 'researcher',
    write: 'writer',
    check: 'quality',
    publish: 'publisher',
    finish: END,
  },
  researcher: { needsTools: 'toolDispatch', researchDone: 'supervisor' },
  toolDispatch: { toolsDone: 'supervisor' },
  writer: { draftReady: 'supervisor' },
  quality: { qualityChecked: 'supervisor' },
  publisher: { published: END },
};

export function resolveTransition(table: TransitionTable, node: NodeName, hint: NextHint): NextNode {
  const next = table[node][hint];
  if (next === undefined) {
    throw new ConfigurationError(`No transition from "${node}" on hint "${hint}"`);
  }
  return next;
}
