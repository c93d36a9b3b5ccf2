import { z } from 'zod';
import type { Completer } from '../services/llm-provider.js';
import { tryParseJSON } from '../services/llm-provider.js';
import type { NextHint, RunState } from '../types/workflow.js';
import { errorMessage } from '../logger.js';
import { SUPERVISOR_SYSTEM, supervisorUserPrompt } from '../prompts/content.js';
import { decide, legalHints, type SupervisorPolicy } from '../workflow/decision-table.js';
import type { NodeContext, NodeResult, WorkflowNode } from '../workflow/node.js';
import { appendHistory } from '../workflow/node.js';

/** Proposes a next hint. Proposals are only taken when the decision table allows them. */
export interface SupervisorAdvisor {
  propose(state: RunState, legal: readonly NextHint[]): Promise<NextHint | null>;
}

const HANDOFF: Partial<Record<NextHint, string>> = {
  research: 'Passing to researcher...',
  write: 'Passing to writer...',
  check: 'Passing to quality checker...',
  publish: 'Passing to publisher...',
  finish: 'Finishing the process...',
};

export class SupervisorNode implements WorkflowNode {
  readonly name = 'supervisor';

  constructor(
    private readonly policy: SupervisorPolicy,
    private readonly advisor?: SupervisorAdvisor,
  ) {}

  async run(state: RunState, ctx: NodeContext): Promise<NodeResult> {
    let hint = decide(state, this.policy);

    if (this.advisor) {
      const legal = legalHints(state, this.policy);
      if (legal.length > 1) {
        const proposal = await this.consultAdvisor(this.advisor, state, legal, ctx);
        if (proposal !== null) hint = proposal;
      }
    }

    let message = HANDOFF[hint] ?? `Next: ${hint}`;
    if (hint === 'write' && state.qualityVerdict === 'duplicate') {
      message = `Redrafting after duplicate verdict ${state.consecutiveDuplicates}/${this.policy.maxDuplicateVerdicts}. ${message}`;
    }

    ctx.log.debug('Supervisor decision', { hint });
    return { state: { ...state, history: appendHistory(state, 'supervisor', message) }, hint };
  }

  private async consultAdvisor(
    advisor: SupervisorAdvisor,
    state: RunState,
    legal: NextHint[],
    ctx: NodeContext,
  ): Promise<NextHint | null> {
    let proposal: NextHint | null;
    try {
      proposal = await advisor.propose(state, legal);
    } catch (error) {
      ctx.log.warn('Supervisor advisor failed, using the decision table', { error: errorMessage(error) });
      return null;
    }
    if (proposal !== null && !legal.includes(proposal)) {
      ctx.log.warn('Advisor proposed an illegal hint, ignoring it', { proposal, legal });
      return null;
    }
    return proposal;
  }
}

const AdvisorReply = z.object({ next: z.string() });

/** Advisor backed by the inference collaborator. */
export class LlmSupervisorAdvisor implements SupervisorAdvisor {
  constructor(private readonly llm: Completer) {}

  async propose(state: RunState, legal: readonly NextHint[]): Promise<NextHint | null> {
    const result = await this.llm.complete(SUPERVISOR_SYSTEM, supervisorUserPrompt(state, legal));
    const parsed = AdvisorReply.safeParse(tryParseJSON(result.content));
    if (!parsed.success) return null;
    return legal.find((hint) => hint === parsed.data.next.trim()) ?? null;
  }
}
