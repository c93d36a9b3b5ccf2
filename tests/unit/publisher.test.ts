import { describe, it, expect } from 'vitest';
import { PublisherNode } from '../../src/nodes/publisher.js';
import { PreconditionViolation, RetryableToolError, ToolCallFailed } from '../../src/errors.js';
import { createRunState, type RunState } from '../../src/types/workflow.js';
import { FakeCapabilities, FIXED_NOW, RUN_ID, fixedClock, nodeContext, testConfig, type ToolHandler } from '../helpers/fakes.js';

const DRAFT = 'Rates held steady this week.';

function state(overrides: Partial<RunState> = {}): RunState {
  return { ...createRunState(RUN_ID, 'interest rates'), draft: DRAFT, qualityVerdict: 'unique', ...overrides };
}

function publisher(handler: ToolHandler): { node: PublisherNode; caps: FakeCapabilities } {
  const caps = new FakeCapabilities({ create_post: handler });
  const node = new PublisherNode({ capabilities: caps, config: testConfig().publish, timeoutMs: 1_000, now: fixedClock });
  return { node, caps };
}

describe('PublisherNode', () => {
  it('is marked as side-effecting', () => {
    expect(publisher(() => ({ ok: true, output: '' })).node.sideEffecting).toBe(true);
  });

  const refusals: Array<[string, Partial<RunState>]> = [
    ['an unchecked draft', { qualityVerdict: 'unchecked' }],
    ['a duplicate draft', { qualityVerdict: 'duplicate' }],
    ['a missing draft', { draft: undefined }],
    ['an existing publication', { publication: { articleText: DRAFT, publishedAt: FIXED_NOW.toISOString() } }],
  ];

  it.each(refusals)('refuses %s without calling the tool', async (_label, overrides) => {
    const { node, caps } = publisher(() => ({ ok: true, output: '{}' }));

    const error = await node.run(state(overrides), nodeContext()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PreconditionViolation);
    expect(error).toMatchObject({ code: 'PublishPreconditionFailed' });
    expect(caps.calls).toHaveLength(0);
  });

  it('records the publication with the post id from a JSON reply', async () => {
    const { node, caps } = publisher(() => ({ ok: true, output: '{"data":{"id":"urn:li:share:7"}}' }));

    const result = await node.run(state(), nodeContext());

    expect(result.hint).toBe('published');
    expect(result.state.publication).toEqual({
      articleText: DRAFT,
      postId: 'urn:li:share:7',
      publishedAt: FIXED_NOW.toISOString(),
    });
    expect(caps.calls).toEqual([
      {
        tool: 'create_post',
        args: {
          author: 'urn:li:organization:1000',
          commentary: DRAFT,
          visibility: 'PUBLIC',
          lifecycleState: 'PUBLISHED',
        },
      },
    ]);
  });

  it('finds a post URN in a plain-text reply', async () => {
    const { node } = publisher(() => ({ ok: true, output: 'Created urn:li:ugcPost:991 successfully' }));

    const result = await node.run(state(), nodeContext());

    expect(result.state.publication?.postId).toBe('urn:li:ugcPost:991');
  });

  it('maps tool failures onto workflow errors', async () => {
    const transient = publisher(() => ({ ok: false, error: { kind: 'retryable', message: '503' } }));
    const fatal = publisher(() => ({ ok: false, error: { kind: 'failed', message: 'forbidden' } }));

    await expect(transient.node.run(state(), nodeContext())).rejects.toBeInstanceOf(RetryableToolError);
    await expect(fatal.node.run(state(), nodeContext())).rejects.toBeInstanceOf(ToolCallFailed);
  });

  it.each(['timeout', 'canceled'] as const)('reports a %s as an unknown publish outcome', async (kind) => {
    const { node, caps } = publisher(() => ({ ok: false, error: { kind, message: 'no answer' } }));

    const error = await node.run(state(), nodeContext()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PreconditionViolation);
    expect(error).toMatchObject({ code: 'PublishOutcomeUnknown' });
    expect(caps.calls).toHaveLength(1);
  });
});
