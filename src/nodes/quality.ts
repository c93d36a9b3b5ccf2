import type { Embedder } from '../services/llm-provider.js';
import type { SimilarityIndex } from '../services/episodic-store.js';
import type { QualityConfig } from '../config.js';
import type { RunState, SimilarityMatch } from '../types/workflow.js';
import { PreconditionViolation } from '../errors.js';
import type { NodeContext, NodeResult, WorkflowNode } from '../workflow/node.js';
import { appendHistory } from '../workflow/node.js';

/**
 * Uniqueness gate. The draft is a duplicate when its nearest published
 * article scores strictly above the configured cosine threshold.
 */
export class QualityNode implements WorkflowNode {
  readonly name = 'quality';

  constructor(
    private readonly embedder: Embedder,
    private readonly index: SimilarityIndex,
    private readonly config: QualityConfig,
  ) {}

  async run(state: RunState, ctx: NodeContext): Promise<NodeResult> {
    const draft = state.draft?.trim();
    if (!draft) {
      throw new PreconditionViolation('EmptyDraftForQuality', 'Quality check requires a non-empty draft');
    }

    const vector = await this.embedder.embed(draft);
    const matches = await this.index.nearestNeighbors(vector, this.config.neighbors);
    const nearest: SimilarityMatch | undefined = matches[0];
    const score = nearest?.score ?? 0;
    const matchedRunId = nearest?.record.runId;
    const duplicate = nearest !== undefined && nearest.score > this.config.similarityThreshold;

    ctx.log.info('Quality verdict', {
      verdict: duplicate ? 'duplicate' : 'unique',
      score,
      threshold: this.config.similarityThreshold,
      matchedRunId,
    });

    const message = duplicate
      ? `Rejected: draft matches the article of run ${matchedRunId} (similarity ${score.toFixed(3)}). Cover a different story.`
      : `Approved: nearest prior article similarity ${score.toFixed(3)}.`;

    return {
      state: {
        ...state,
        qualityVerdict: duplicate ? 'duplicate' : 'unique',
        similarity: matchedRunId === undefined ? { score } : { score, matchedRunId },
        draftEmbedding: vector,
        consecutiveDuplicates: duplicate ? state.consecutiveDuplicates + 1 : 0,
        rejectedDrafts: duplicate ? [...state.rejectedDrafts, draft] : state.rejectedDrafts,
        history: appendHistory(state, 'quality', message),
      },
      hint: 'qualityChecked',
    };
  }
}
