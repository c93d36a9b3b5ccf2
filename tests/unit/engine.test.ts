import { describe, it, expect } from 'vitest';
import { WorkflowEngine } from '../../src/workflow/engine.js';
import { buildNodes, createWorkflowEngine } from '../../src/workflow/graph.js';
import { createRunState, END, type Checkpoint } from '../../src/types/workflow.js';
import type { WorkflowNode } from '../../src/workflow/node.js';
import { WRITER_SYSTEM } from '../../src/prompts/content.js';
import { ConfigurationError } from '../../src/errors.js';
import type { ToolOutcome } from '../../src/services/capability-client.js';
import {
  FakeCapabilities,
  FakeLlm,
  FIXED_NOW,
  MemoryLedger,
  OTHER_RUN_ID,
  RUN_ID,
  fixedClock,
  priorRecord,
  searchOutput,
  testConfig,
  type ToolHandler,
} from '../helpers/fakes.js';

const DRAFT = 'Rates held steady this week. What does that mean for your portfolio?';

const TWO_HITS = searchOutput([
  { url: 'https://news.example.com/rates', title: 'Central bank holds rates', text: 'The bank held rates.' },
  { url: 'https://news.example.com/bonds', title: 'Bond yields dip', text: 'Yields fell slightly.' },
]);

function capabilities(overrides: Record<string, ToolHandler> = {}): FakeCapabilities {
  return new FakeCapabilities({
    search_and_content: () => TWO_HITS,
    create_post: () => ({ ok: true, output: '{"id":"urn:li:share:42"}' }),
    ...overrides,
  });
}

// cos([1,0,0], [0.2, sqrt(0.96), 0]) = 0.2
const distantPrior = () => priorRecord(OTHER_RUN_ID, [0.2, Math.sqrt(0.96), 0]);

describe('WorkflowEngine', () => {
  it('runs a fresh topic through to a single publication', async () => {
    const ledger = new MemoryLedger([distantPrior()]);
    const caps = capabilities();
    const llm = new FakeLlm({ drafts: [DRAFT], embed: () => [1, 0, 0] });
    const engine = createWorkflowEngine(testConfig(), { store: ledger, capabilities: caps, llm, now: fixedClock });

    const outcome = await engine.run(createRunState(RUN_ID, 'interest rates'));

    expect(outcome.status).toBe('completed');
    expect(outcome.steps).toBe(12);
    expect(outcome.state.researchFindings.map((f) => f.url)).toEqual([
      'https://news.example.com/rates',
      'https://news.example.com/bonds',
    ]);
    expect(outcome.state.qualityVerdict).toBe('unique');
    expect(outcome.state.similarity?.score).toBeCloseTo(0.2);
    expect(outcome.state.similarity?.matchedRunId).toBe(OTHER_RUN_ID);
    expect(outcome.state.publication).toEqual({
      articleText: DRAFT,
      postId: 'urn:li:share:42',
      publishedAt: FIXED_NOW.toISOString(),
    });

    expect(caps.callsTo('create_post')).toBe(1);
    expect(caps.calls.find((c) => c.tool === 'create_post')?.args).toEqual({
      author: 'urn:li:organization:1000',
      commentary: DRAFT,
      visibility: 'PUBLIC',
      lifecycleState: 'PUBLISHED',
    });
    expect(ledger.records.get(RUN_ID)).toEqual({
      runId: RUN_ID,
      articleText: DRAFT,
      embeddingVector: [1, 0, 0],
      publishedAt: FIXED_NOW.toISOString(),
    });
  });

  it('writes one checkpoint per step, marking the publisher in flight before it runs', async () => {
    const ledger = new MemoryLedger([distantPrior()]);
    const engine = createWorkflowEngine(testConfig(), {
      store: ledger,
      capabilities: capabilities(),
      llm: new FakeLlm({ drafts: [DRAFT] }),
      now: fixedClock,
    });

    await engine.run(createRunState(RUN_ID, 'interest rates'));

    const checkpoints = await ledger.listCheckpoints(RUN_ID);
    expect(checkpoints.map((c) => c.step)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(checkpoints.map((c) => `${c.nodeName}>${c.nextNode}`)).toEqual([
      'supervisor>researcher',
      'researcher>toolDispatch',
      'toolDispatch>supervisor',
      'supervisor>researcher',
      'researcher>supervisor',
      'supervisor>writer',
      'writer>supervisor',
      'supervisor>quality',
      'quality>supervisor',
      'supervisor>publisher',
      'publisher>publisher',
      `publisher>${END}`,
    ]);
    expect(checkpoints[10].status).toBe('in-flight');
    expect(checkpoints[11].status).toBe('completed');
  });

  it('refuses to start a run id that already has checkpoints', async () => {
    const ledger = new MemoryLedger();
    const engine = createWorkflowEngine(testConfig(), {
      store: ledger,
      capabilities: capabilities(),
      llm: new FakeLlm(),
      now: fixedClock,
    });
    await engine.run(createRunState(RUN_ID, 'interest rates'));

    await expect(engine.run(createRunState(RUN_ID, 'interest rates'))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('never invokes the publish tool when the supervisor routes to the publisher too early', async () => {
    const ledger = new MemoryLedger();
    const caps = capabilities();
    const eager: WorkflowNode = {
      name: 'supervisor',
      run: async (state) => ({ state, hint: 'publish' }),
    };
    const nodes = { ...buildNodes(testConfig(), { store: ledger, capabilities: caps, llm: new FakeLlm() }), supervisor: eager };
    const engine = new WorkflowEngine({ nodes, ledger, config: testConfig().engine, now: fixedClock });

    const outcome = await engine.run(createRunState(RUN_ID, 'interest rates'));

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toMatchObject({ kind: 'PreconditionViolation', code: 'PublishPreconditionFailed' });
    expect(outcome.steps).toBe(3);
    expect(caps.callsTo('create_post')).toBe(0);
    expect(ledger.records.size).toBe(0);
  });

  it('rejects the run once the redraft budget is spent on duplicates', async () => {
    const ledger = new MemoryLedger([priorRecord(OTHER_RUN_ID, [1, 0, 0])]);
    const caps = capabilities();
    const llm = new FakeLlm({ drafts: ['First take.', 'Second take.'], embed: () => [1, 0, 0] });
    const engine = createWorkflowEngine(testConfig({ maxDuplicateVerdicts: 2 }), {
      store: ledger,
      capabilities: caps,
      llm,
      now: fixedClock,
    });

    const outcome = await engine.run(createRunState(RUN_ID, 'interest rates'));

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error.kind).toBe('DuplicateContentRejected');
    expect(outcome.steps).toBe(14);
    expect(outcome.state.consecutiveDuplicates).toBe(2);
    expect(outcome.state.rejectedDrafts).toEqual(['First take.', 'Second take.']);
    expect(llm.prompts.filter((p) => p.system === WRITER_SYSTEM)).toHaveLength(2);
    expect(caps.callsTo('create_post')).toBe(0);
    expect(ledger.records.has(RUN_ID)).toBe(false);
  });

  it('resumes a canceled run to the same final state as an uninterrupted one', async () => {
    const straightLedger = new MemoryLedger([distantPrior()]);
    const straight = await createWorkflowEngine(testConfig(), {
      store: straightLedger,
      capabilities: capabilities(),
      llm: new FakeLlm({ drafts: [DRAFT] }),
      now: fixedClock,
    }).run(createRunState(RUN_ID, 'interest rates'));

    const ledger = new MemoryLedger([distantPrior()]);
    const controller = new AbortController();
    const caps = capabilities({
      search_and_content: () => {
        controller.abort();
        return TWO_HITS;
      },
    });
    const services = { store: ledger, capabilities: caps, llm: new FakeLlm({ drafts: [DRAFT] }), now: fixedClock };

    const canceled = await createWorkflowEngine(testConfig(), services).run(createRunState(RUN_ID, 'interest rates'), {
      signal: controller.signal,
    });
    expect(canceled.status).toBe('canceled');
    expect(canceled.steps).toBe(4);
    const latest = await ledger.loadLatestCheckpoint(RUN_ID);
    expect(latest).toMatchObject({ status: 'canceled', nodeName: 'toolDispatch', nextNode: 'supervisor' });

    const resumed = await createWorkflowEngine(testConfig(), services).resume(RUN_ID);

    expect(resumed.status).toBe('completed');
    expect(resumed.steps).toBe(13);
    expect(resumed.state).toEqual(straight.state);
    expect(caps.callsTo('search_and_content')).toBe(1);
    expect(caps.callsTo('create_post')).toBe(1);
  });

  it('re-commits an unrecorded publication on resume without publishing again', async () => {
    const ledger = new MemoryLedger([distantPrior()]);
    ledger.failCommits = 1;
    const caps = capabilities();
    const services = { store: ledger, capabilities: caps, llm: new FakeLlm({ drafts: [DRAFT] }), now: fixedClock };

    const first = await createWorkflowEngine(testConfig(), services).run(createRunState(RUN_ID, 'interest rates'));

    expect(first.status).toBe('failed');
    if (first.status !== 'failed') return;
    expect(first.error.kind).toBe('PublicationUnrecorded');
    expect(first.state.publication?.postId).toBe('urn:li:share:42');
    expect(ledger.records.has(RUN_ID)).toBe(false);

    const resumed = await createWorkflowEngine(testConfig(), services).resume(RUN_ID);

    expect(resumed.status).toBe('completed');
    expect(resumed.steps).toBe(13);
    expect(ledger.records.get(RUN_ID)?.articleText).toBe(DRAFT);
    expect(caps.callsTo('create_post')).toBe(1);
  });

  it('fails instead of republishing when the last checkpoint is in flight', async () => {
    const ledger = new MemoryLedger();
    const state = { ...createRunState(RUN_ID, 'interest rates'), draft: DRAFT, qualityVerdict: 'unique' as const };
    const inFlight: Checkpoint = {
      runId: RUN_ID,
      step: 11,
      nodeName: 'publisher',
      nextNode: 'publisher',
      status: 'in-flight',
      stateSnapshot: state,
      timestamp: FIXED_NOW.toISOString(),
    };
    await ledger.checkpoint(inFlight);
    const caps = capabilities();

    const outcome = await createWorkflowEngine(testConfig(), {
      store: ledger,
      capabilities: caps,
      llm: new FakeLlm(),
      now: fixedClock,
    }).resume(RUN_ID);

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toMatchObject({ kind: 'PreconditionViolation', code: 'PublishOutcomeUnknown' });
    expect(caps.callsTo('create_post')).toBe(0);
  });

  it('waits for a publisher that outlives the run deadline and records its post', async () => {
    const ledger = new MemoryLedger([distantPrior()]);
    const slowPost: ToolHandler = () =>
      new Promise<ToolOutcome>((resolve) => setTimeout(() => resolve({ ok: true, output: '{"id":"urn:li:share:42"}' }), 250));
    const caps = capabilities({ create_post: slowPost });
    const engine = createWorkflowEngine(
      testConfig({ engine: { maxSteps: 40, nodeRetryLimit: 2, retryBackoffMs: 0, runTimeoutMs: 100 } }),
      { store: ledger, capabilities: caps, llm: new FakeLlm({ drafts: [DRAFT] }), now: fixedClock },
    );

    const outcome = await engine.run(createRunState(RUN_ID, 'interest rates'));

    expect(outcome.status).toBe('completed');
    expect(outcome.steps).toBe(12);
    expect(outcome.state.publication?.postId).toBe('urn:li:share:42');
    expect(ledger.records.get(RUN_ID)?.articleText).toBe(DRAFT);
    expect(caps.callsTo('create_post')).toBe(1);
  });

  it('records an unknown publish outcome when the publish call times out', async () => {
    const ledger = new MemoryLedger([distantPrior()]);
    const caps = capabilities({
      create_post: () => ({ ok: false, error: { kind: 'timeout', message: 'create_post did not answer' } }),
    });
    const services = { store: ledger, capabilities: caps, llm: new FakeLlm({ drafts: [DRAFT] }), now: fixedClock };

    const outcome = await createWorkflowEngine(testConfig(), services).run(createRunState(RUN_ID, 'interest rates'));

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.steps).toBe(12);
    expect(outcome.error).toMatchObject({ kind: 'PreconditionViolation', code: 'PublishOutcomeUnknown' });
    expect((await ledger.loadLatestCheckpoint(RUN_ID))?.error).toMatchObject({ code: 'PublishOutcomeUnknown' });

    const resumed = await createWorkflowEngine(testConfig(), services).resume(RUN_ID);

    expect(resumed.status).toBe('failed');
    if (resumed.status !== 'failed') return;
    expect(resumed.error).toMatchObject({ code: 'PublishOutcomeUnknown' });
    expect(caps.callsTo('create_post')).toBe(1);
  });

  it('stops with RunExceededStepBudget when the budget runs out', async () => {
    const ledger = new MemoryLedger();
    const engine = createWorkflowEngine(
      testConfig({ engine: { maxSteps: 3, nodeRetryLimit: 2, retryBackoffMs: 0, runTimeoutMs: 60_000 } }),
      { store: ledger, capabilities: capabilities(), llm: new FakeLlm(), now: fixedClock },
    );

    const outcome = await engine.run(createRunState(RUN_ID, 'interest rates'));

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error.kind).toBe('RunExceededStepBudget');
    expect(outcome.steps).toBe(4);
    expect((await ledger.loadLatestCheckpoint(RUN_ID))?.status).toBe('failed');
  });

  it('retries a node that returned an empty draft', async () => {
    const ledger = new MemoryLedger([distantPrior()]);
    const llm = new FakeLlm({ drafts: ['   ', DRAFT] });
    const engine = createWorkflowEngine(testConfig(), { store: ledger, capabilities: capabilities(), llm, now: fixedClock });

    const outcome = await engine.run(createRunState(RUN_ID, 'interest rates'));

    expect(outcome.status).toBe('completed');
    expect(outcome.state.draft).toBe(DRAFT);
    expect(llm.prompts.filter((p) => p.system === WRITER_SYSTEM)).toHaveLength(2);
  });

  it('fails with RunTimedOut when a node outlives the run deadline', async () => {
    const ledger = new MemoryLedger();
    const slowSearch: ToolHandler = () =>
      new Promise<ToolOutcome>((resolve) => setTimeout(() => resolve(TWO_HITS), 200));
    const engine = createWorkflowEngine(
      testConfig({ engine: { maxSteps: 40, nodeRetryLimit: 2, retryBackoffMs: 0, runTimeoutMs: 50 } }),
      { store: ledger, capabilities: capabilities({ search_and_content: slowSearch }), llm: new FakeLlm(), now: fixedClock },
    );

    const outcome = await engine.run(createRunState(RUN_ID, 'interest rates'));

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error.kind).toBe('RunTimedOut');
  });
});
