import { z } from 'zod';
import type { CapabilityClient } from '../services/capability-client.js';
import type { PublishConfig } from '../config.js';
import type { RunState } from '../types/workflow.js';
import { PreconditionViolation, RetryableToolError, ToolCallFailed } from '../errors.js';
import type { NodeContext, NodeResult, WorkflowNode } from '../workflow/node.js';
import { appendHistory } from '../workflow/node.js';

const PublishResponse = z
  .object({
    id: z.string().optional(),
    data: z.object({ id: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export interface PublisherDeps {
  capabilities: CapabilityClient;
  config: PublishConfig;
  timeoutMs: number;
  now?: () => Date;
}

/**
 * Publishes the approved draft. It checks its own precondition even though
 * the supervisor only routes here after a unique verdict, and it leaves the
 * episodic record to the engine, which commits it with the final checkpoint.
 */
export class PublisherNode implements WorkflowNode {
  readonly name = 'publisher';
  readonly sideEffecting = true;
  private readonly now: () => Date;

  constructor(private readonly deps: PublisherDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(state: RunState, ctx: NodeContext): Promise<NodeResult> {
    const draft = state.draft?.trim();
    if (state.qualityVerdict !== 'unique' || !draft) {
      throw new PreconditionViolation(
        'PublishPreconditionFailed',
        `Publisher requires a unique, non-empty draft (verdict: ${state.qualityVerdict})`,
      );
    }
    if (state.publication) {
      throw new PreconditionViolation('PublishPreconditionFailed', 'Run has already published an article');
    }

    const { publishTool, organizationUrn, visibility, lifecycleState } = this.deps.config;
    const outcome = await this.deps.capabilities.invoke(
      publishTool,
      { author: organizationUrn, commentary: draft, visibility, lifecycleState },
      { timeoutMs: this.deps.timeoutMs },
    );

    if (!outcome.ok) {
      if (outcome.error.kind === 'timeout' || outcome.error.kind === 'canceled') {
        throw new PreconditionViolation(
          'PublishOutcomeUnknown',
          `Publishing through ${publishTool} ended without an answer (${outcome.error.kind}): ${outcome.error.message}; the post may exist and will not be retried`,
        );
      }
      const message = `Publishing through ${publishTool} failed (${outcome.error.kind}): ${outcome.error.message}`;
      throw outcome.error.kind === 'retryable' ? new RetryableToolError(message) : new ToolCallFailed(message);
    }

    const postId = extractPostId(outcome.output);
    const publishedAt = this.now().toISOString();
    ctx.log.info('Article published', { tool: publishTool, postId, length: draft.length });

    return {
      state: {
        ...state,
        publication: postId ? { articleText: draft, postId, publishedAt } : { articleText: draft, publishedAt },
        history: appendHistory(state, 'publisher', `Published${postId ? ` as ${postId}` : ''}`),
      },
      hint: 'published',
    };
  }
}

function extractPostId(output: string): string | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch {
    return output.match(/urn:li:(?:share|ugcPost|post):[\w-]+/)?.[0];
  }
  const parsed = PublishResponse.safeParse(raw);
  if (!parsed.success) return undefined;
  return parsed.data.id ?? parsed.data.data?.id;
}
