import type { Logger } from '../logger.js';
import type { NextHint, NodeName, RunMessage, RunState } from '../types/workflow.js';

export interface NodeContext {
  runId: string;
  step: number;
  /** 1-based; greater than 1 when the engine is retrying this node. */
  attempt: number;
  signal: AbortSignal;
  log: Logger;
}

export interface NodeResult {
  state: RunState;
  hint: NextHint;
}

/**
 * A named, stateless unit of behaviour. Nodes never call each other; they
 * return a hint and the engine picks the next node.
 */
export interface WorkflowNode {
  readonly name: NodeName;
  /** Nodes with external side effects are checkpointed before they run and never retried. */
  readonly sideEffecting?: boolean;
  run(state: RunState, ctx: NodeContext): Promise<NodeResult>;
}

export function appendHistory(state: RunState, node: NodeName, content: string): RunMessage[] {
  return [...state.history, { node, content }];
}
