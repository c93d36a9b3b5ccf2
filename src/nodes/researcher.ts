import { z } from 'zod';
import type { Completer } from '../services/llm-provider.js';
import { tryParseJSON } from '../services/llm-provider.js';
import type { ResearchConfig } from '../config.js';
import type { Finding, RunState, ToolCall, ToolCallResult } from '../types/workflow.js';
import { NoResearchFound } from '../errors.js';
import { errorMessage } from '../logger.js';
import { RESEARCHER_SYSTEM, researcherUserPrompt } from '../prompts/content.js';
import type { NodeContext, NodeResult, WorkflowNode } from '../workflow/node.js';
import { appendHistory } from '../workflow/node.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const RETRY_MARKER = 'retry';

const QueryList = z.array(z.string().trim().min(1));

const SearchHit = z.object({
  title: z.string().nullish(),
  url: z.string().min(1),
  text: z.string().nullish(),
  snippet: z.string().nullish(),
  publishedDate: z.string().nullish(),
});

const SearchPayload = z.union([z.array(SearchHit), z.object({ results: z.array(SearchHit) })]);

export interface ResearcherDeps {
  config: ResearchConfig;
  /** Proposes search queries; without it the topic itself is searched. */
  planner?: Completer;
  now?: () => Date;
}

/**
 * Two-phase researcher. First it asks for searches (through the tool
 * dispatch node); once the results are back it turns them into findings.
 * A round that finds nothing gets one broadened retry, then the run fails
 * with NoResearchFound.
 */
export class ResearcherNode implements WorkflowNode {
  readonly name = 'researcher';
  private readonly now: () => Date;

  constructor(private readonly deps: ResearcherDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(state: RunState, ctx: NodeContext): Promise<NodeResult> {
    const mine = state.toolResults.filter((r) => r.requestedBy === 'researcher');
    if (mine.length === 0) {
      const queries = await this.planQueries(state, ctx);
      return this.requestSearches(state, queries, false);
    }
    return this.consume(state, mine, ctx);
  }

  private async planQueries(state: RunState, ctx: NodeContext): Promise<string[]> {
    const { maxSearchQueries } = this.deps.config;
    if (!this.deps.planner) return [state.topic];

    const today = this.now().toISOString().slice(0, 10);
    const result = await this.deps.planner.complete(RESEARCHER_SYSTEM, researcherUserPrompt(state, maxSearchQueries, today));
    const parsed = QueryList.safeParse(tryParseJSON(result.content));
    if (!parsed.success || parsed.data.length === 0) {
      ctx.log.warn('Failed to parse query plan, searching the topic');
      return [state.topic];
    }
    return [...new Set(parsed.data)].slice(0, maxSearchQueries);
  }

  private requestSearches(state: RunState, queries: string[], retry: boolean): NodeResult {
    const { searchTool, searchWindowDays } = this.deps.config;
    const round = state.researchRounds + 1;
    const end = this.now();
    const start = new Date(end.getTime() - searchWindowDays * DAY_MS);

    const calls: ToolCall[] = queries.map((query, index) => ({
      id: `research-${round}-${retry ? `${RETRY_MARKER}-` : ''}${index + 1}`,
      tool: searchTool,
      args: {
        query,
        start_published_date: `${start.toISOString().slice(0, 10)}T00:00:00.000Z`,
        end_published_date: end.toISOString(),
      },
      requestedBy: 'researcher',
    }));

    return {
      state: {
        ...state,
        researchRounds: round,
        pendingToolCalls: [...state.pendingToolCalls, ...calls],
        history: appendHistory(
          state,
          'researcher',
          `${retry ? 'Broadened search' : 'Searching'}: ${queries.map((q) => `"${q}"`).join(', ')}`,
        ),
      },
      hint: 'needsTools',
    };
  }

  private consume(state: RunState, results: ToolCallResult[], ctx: NodeContext): NodeResult {
    const known = new Set(state.researchFindings.map((f) => f.url));
    const fresh: Finding[] = [];

    for (const result of results) {
      if (!result.ok) {
        ctx.log.warn('Search call failed', { callId: result.callId, kind: result.error.kind, error: result.error.message });
        continue;
      }
      for (const finding of parseFindings(result.output, ctx)) {
        if (known.has(finding.url)) continue;
        known.add(finding.url);
        fresh.push(finding);
      }
    }

    const remaining = state.toolResults.filter((r) => r.requestedBy !== 'researcher');
    const failed = results.filter((r) => !r.ok).length;

    if (fresh.length === 0) {
      const wasRetry = results.some((r) => r.callId.includes(`-${RETRY_MARKER}-`));
      if (wasRetry) {
        throw new NoResearchFound(`No usable search results for "${state.topic}" after a broadened retry`);
      }
      ctx.log.info('No findings, broadening the search once', { failedCalls: failed });
      return this.requestSearches({ ...state, toolResults: remaining }, [state.topic], true);
    }

    ctx.log.info('Research collected', { newFindings: fresh.length, failedCalls: failed });
    return {
      state: {
        ...state,
        toolResults: remaining,
        researchFindings: [...state.researchFindings, ...fresh],
        history: appendHistory(
          state,
          'researcher',
          `Collected ${fresh.length} finding(s):\n${fresh.map((f) => `- ${f.title} (${f.url})`).join('\n')}`,
        ),
      },
      hint: 'researchDone',
    };
  }
}

function parseFindings(output: string, ctx: NodeContext): Finding[] {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch (error) {
    ctx.log.warn('Search output is not JSON', { error: errorMessage(error) });
    return [];
  }
  const parsed = SearchPayload.safeParse(raw);
  if (!parsed.success) {
    ctx.log.warn('Search output has an unexpected shape');
    return [];
  }
  const hits = Array.isArray(parsed.data) ? parsed.data : parsed.data.results;
  return hits.map((hit) => ({
    url: hit.url,
    title: hit.title?.trim() || hit.url,
    snippet: (hit.text ?? hit.snippet ?? '').trim(),
    ...(hit.publishedDate ? { publishedDate: hit.publishedDate } : {}),
  }));
}
