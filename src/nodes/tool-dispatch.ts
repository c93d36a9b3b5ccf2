import type { ToolDispatcher } from '../services/tool-dispatcher.js';
import type { NodeContext, NodeResult, WorkflowNode } from '../workflow/node.js';
import { appendHistory } from '../workflow/node.js';
import type { RunState } from '../types/workflow.js';

/** Runs the pending tool calls and merges their results into the run state by call id. */
export class ToolDispatchNode implements WorkflowNode {
  readonly name = 'toolDispatch';

  constructor(private readonly dispatcher: ToolDispatcher) {}

  async run(state: RunState, ctx: NodeContext): Promise<NodeResult> {
    const calls = state.pendingToolCalls;
    if (calls.length === 0) {
      ctx.log.warn('Tool dispatch invoked with no pending calls');
      return { state, hint: 'toolsDone' };
    }

    const results = await this.dispatcher.dispatch(calls, ctx.signal);
    const answered = new Set(results.map((r) => r.callId));
    const failed = results.filter((r) => !r.ok).length;

    return {
      state: {
        ...state,
        pendingToolCalls: [],
        toolResults: [...state.toolResults.filter((r) => !answered.has(r.callId)), ...results],
        history: appendHistory(
          state,
          'toolDispatch',
          `Executed ${results.length} tool call(s): ${results.length - failed} succeeded, ${failed} failed`,
        ),
      },
      hint: 'toolsDone',
    };
  }
}
