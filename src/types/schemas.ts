import { z } from 'zod';
import { END, NODE_NAMES } from './workflow.js';

const NodeNameSchema = z.enum(NODE_NAMES);

const ToolCallResultSchema = z.discriminatedUnion('ok', [
  z.object({
    callId: z.string(),
    tool: z.string(),
    requestedBy: NodeNameSchema,
    ok: z.literal(true),
    output: z.string(),
  }),
  z.object({
    callId: z.string(),
    tool: z.string(),
    requestedBy: NodeNameSchema,
    ok: z.literal(false),
    error: z.object({
      kind: z.enum(['failed', 'retryable', 'timeout', 'canceled']),
      message: z.string(),
    }),
  }),
]);

export const RunStateSchema = z.object({
  runId: z.string(),
  topic: z.string(),
  history: z.array(z.object({ node: NodeNameSchema, content: z.string() })),
  draft: z.string().optional(),
  researchFindings: z.array(
    z.object({
      url: z.string(),
      title: z.string(),
      snippet: z.string(),
      publishedDate: z.string().optional(),
    }),
  ),
  qualityVerdict: z.enum(['unchecked', 'unique', 'duplicate']),
  similarity: z.object({ score: z.number(), matchedRunId: z.string().optional() }).optional(),
  draftEmbedding: z.array(z.number()).optional(),
  pendingToolCalls: z.array(
    z.object({
      id: z.string(),
      tool: z.string(),
      args: z.record(z.unknown()),
      requestedBy: NodeNameSchema,
    }),
  ),
  toolResults: z.array(ToolCallResultSchema),
  researchRounds: z.number().int(),
  consecutiveDuplicates: z.number().int(),
  rejectedDrafts: z.array(z.string()),
  publication: z
    .object({ articleText: z.string(), postId: z.string().optional(), publishedAt: z.string() })
    .optional(),
});

export const CheckpointSchema = z.object({
  runId: z.string(),
  step: z.number().int().nonnegative(),
  nodeName: NodeNameSchema,
  nextNode: z.union([NodeNameSchema, z.literal(END)]),
  status: z.enum(['running', 'in-flight', 'completed', 'failed', 'canceled']),
  stateSnapshot: RunStateSchema,
  timestamp: z.string(),
  error: z.object({ kind: z.string(), message: z.string(), code: z.string().optional() }).optional(),
});

export const EpisodicRecordSchema = z.object({
  runId: z.string(),
  articleText: z.string(),
  embeddingVector: z.array(z.number()).min(1),
  publishedAt: z.string(),
});
