import type { Completer } from '../services/llm-provider.js';
import type { RunState } from '../types/workflow.js';
import { EmptyDraft, PreconditionViolation } from '../errors.js';
import { WRITER_SYSTEM, writerUserPrompt } from '../prompts/content.js';
import type { NodeContext, NodeResult, WorkflowNode } from '../workflow/node.js';
import { appendHistory } from '../workflow/node.js';

/**
 * Turns the research findings into a draft. Every invocation replaces the
 * draft wholesale and sends it back to an unchecked verdict.
 */
export class WriterNode implements WorkflowNode {
  readonly name = 'writer';

  constructor(private readonly writer: Completer) {}

  async run(state: RunState, ctx: NodeContext): Promise<NodeResult> {
    if (state.researchFindings.length === 0) {
      throw new PreconditionViolation('MissingResearch', 'Writer invoked without research findings');
    }

    const result = await this.writer.complete(WRITER_SYSTEM, writerUserPrompt(state));
    const draft = result.content.trim();
    if (!draft) {
      throw new EmptyDraft(`Writer model ${result.model} returned an empty draft`);
    }

    ctx.log.info('Draft written', { length: draft.length, redraft: state.draft !== undefined });
    return {
      state: {
        ...state,
        draft,
        qualityVerdict: 'unchecked',
        similarity: undefined,
        draftEmbedding: undefined,
        history: appendHistory(state, 'writer', draft),
      },
      hint: 'draftReady',
    };
  }
}
