export const NODE_NAMES = ['supervisor', 'researcher', 'writer', 'quality', 'publisher', 'toolDispatch'] as const;

export type NodeName = (typeof NODE_NAMES)[number];

/** Sentinel the transition table resolves to when a run is over. */
export const END = '__end__';

export type NextNode = NodeName | typeof END;

/**
 * Symbolic progress signals. Nodes return hints, never node names; the
 * engine's transition table turns a (node, hint) pair into the next node.
 */
export type NextHint =
  // supervisor decisions
  | 'research'
  | 'write'
  | 'check'
  | 'publish'
  | 'finish'
  // agent outcomes
  | 'needsTools'
  | 'toolsDone'
  | 'researchDone'
  | 'draftReady'
  | 'qualityChecked'
  | 'published';

export type QualityVerdict = 'unchecked' | 'unique' | 'duplicate';

export interface RunMessage {
  node: NodeName;
  content: string;
}

export interface Finding {
  url: string;
  title: string;
  snippet: string;
  publishedDate?: string;
}

export type ToolArgs = Record<string, unknown>;

export interface ToolCall {
  id: string;
  tool: string;
  args: ToolArgs;
  requestedBy: NodeName;
}

export type ToolErrorKind = 'failed' | 'retryable' | 'timeout' | 'canceled';

export type ToolCallResult =
  | { callId: string; tool: string; requestedBy: NodeName; ok: true; output: string }
  | { callId: string; tool: string; requestedBy: NodeName; ok: false; error: { kind: ToolErrorKind; message: string } };

export interface SimilarityCheck {
  score: number;
  matchedRunId?: string;
}

export interface Publication {
  articleText: string;
  postId?: string;
  publishedAt: string;
}

export interface RunState {
  readonly runId: string;
  topic: string;
  history: RunMessage[];
  draft?: string;
  researchFindings: Finding[];
  qualityVerdict: QualityVerdict;
  similarity?: SimilarityCheck;
  draftEmbedding?: number[];
  pendingToolCalls: ToolCall[];
  toolResults: ToolCallResult[];
  researchRounds: number;
  consecutiveDuplicates: number;
  rejectedDrafts: string[];
  publication?: Publication;
}

export type CheckpointStatus = 'running' | 'in-flight' | 'completed' | 'failed' | 'canceled';

export interface CheckpointError {
  kind: string;
  message: string;
  code?: string;
}

export interface Checkpoint {
  runId: string;
  step: number;
  nodeName: NodeName;
  /** Node the engine will invoke next; END for terminal checkpoints. */
  nextNode: NextNode;
  status: CheckpointStatus;
  stateSnapshot: RunState;
  timestamp: string;
  error?: CheckpointError;
}

export interface EpisodicRecord {
  runId: string;
  articleText: string;
  embeddingVector: number[];
  publishedAt: string;
}

export interface SimilarityMatch {
  record: EpisodicRecord;
  score: number;
}

export function createRunState(runId: string, topic: string): RunState {
  return {
    runId,
    topic,
    history: [],
    researchFindings: [],
    qualityVerdict: 'unchecked',
    pendingToolCalls: [],
    toolResults: [],
    researchRounds: 0,
    consecutiveDuplicates: 0,
    rejectedDrafts: [],
  };
}
