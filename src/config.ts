import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

const intFromEnv = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const listFromEnv = z
  .string()
  .optional()
  .transform((value) => (value ? value.split(/\s+/).filter(Boolean) : []));

/** Raw environment schema. Every tunable of the workflow lives here with its default. */
const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CONTENT_TOPIC: z.string().min(1).default('quantitative finance'),

  SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.8),
  SIMILARITY_NEIGHBORS: intFromEnv(3, 1),
  MAX_DUPLICATE_VERDICTS: intFromEnv(3, 1),

  MAX_STEPS: intFromEnv(40, 1),
  NODE_RETRY_LIMIT: intFromEnv(2),
  RETRY_BACKOFF_MS: intFromEnv(500),
  RUN_TIMEOUT_MS: intFromEnv(600_000, 1),

  TOOL_TIMEOUT_MS: intFromEnv(30_000, 1),
  TOOL_CONCURRENCY: intFromEnv(4, 1),
  TOOL_RETRY_LIMIT: intFromEnv(2),

  MAX_SEARCH_QUERIES: intFromEnv(3, 1),
  SEARCH_WINDOW_DAYS: intFromEnv(30, 1),
  SEARCH_TOOL: z.string().min(1).default('search_and_content'),
  PUBLISH_TOOL: z.string().min(1).default('LINKEDIN_CREATE_LINKED_IN_POST'),

  ORGANIZATION_URN: z.string().default(''),
  VISIBILITY: z.string().default('PUBLIC'),
  LIFECYCLE_STATE: z.string().default('PUBLISHED'),

  STORE_DIR: z.string().optional(),
  SUPERVISOR_ADVISOR: z.enum(['none', 'llm']).default('none'),

  LLM_API_KEY: z.string().default(''),
  LLM_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  LLM_MODEL: z.string().default('gpt-4o'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  LLM_MAX_TOKENS: intFromEnv(4096, 1),

  LOCAL_PROVIDER_COMMAND: z.string().optional(),
  LOCAL_PROVIDER_ARGS: listFromEnv,
  REMOTE_PROVIDER_URL: z.string().url().optional(),
  REMOTE_PROVIDER_TRANSPORT: z.enum(['sse', 'streamable-http']).default('sse'),

  EXA_API_KEY: z.string().default(''),
});

export type ProviderConfig =
  | { name: string; transport: 'stdio'; command: string; args: string[]; env?: Record<string, string> }
  | { name: string; transport: 'sse' | 'streamable-http'; url: string };

export interface EngineConfig {
  maxSteps: number;
  nodeRetryLimit: number;
  retryBackoffMs: number;
  runTimeoutMs: number;
}

export interface QualityConfig {
  similarityThreshold: number;
  neighbors: number;
}

export interface DispatchConfig {
  toolTimeoutMs: number;
  toolConcurrency: number;
  toolRetryLimit: number;
  retryBackoffMs: number;
}

export interface ResearchConfig {
  searchTool: string;
  maxSearchQueries: number;
  searchWindowDays: number;
}

export interface PublishConfig {
  publishTool: string;
  organizationUrn: string;
  visibility: string;
  lifecycleState: string;
}

export interface LLMConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  embeddingModel: string;
  maxTokens: number;
}

export interface AppConfig {
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  topic: string;
  storeDir: string;
  maxDuplicateVerdicts: number;
  supervisorAdvisor: 'none' | 'llm';
  engine: EngineConfig;
  quality: QualityConfig;
  dispatch: DispatchConfig;
  research: ResearchConfig;
  publish: PublishConfig;
  llm: LLMConfig;
  providers: ProviderConfig[];
  exaApiKey: string;
}

function providersFrom(env: z.infer<typeof EnvSchema>): ProviderConfig[] {
  const providers: ProviderConfig[] = [];
  if (env.LOCAL_PROVIDER_COMMAND) {
    providers.push({
      name: 'local-tools',
      transport: 'stdio',
      command: env.LOCAL_PROVIDER_COMMAND,
      args: env.LOCAL_PROVIDER_ARGS,
    });
  }
  if (env.REMOTE_PROVIDER_URL) {
    providers.push({ name: 'publisher', transport: env.REMOTE_PROVIDER_TRANSPORT, url: env.REMOTE_PROVIDER_URL });
  }
  return providers;
}

/**
 * Parse the process environment into the application configuration.
 * Throws ConfigurationError with every offending key when validation fails.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const env = parsed.data;

  return {
    logLevel: env.LOG_LEVEL,
    topic: env.CONTENT_TOPIC,
    storeDir: env.STORE_DIR ?? path.join(os.tmpdir(), 'content-supervisor-store'),
    maxDuplicateVerdicts: env.MAX_DUPLICATE_VERDICTS,
    supervisorAdvisor: env.SUPERVISOR_ADVISOR,
    engine: {
      maxSteps: env.MAX_STEPS,
      nodeRetryLimit: env.NODE_RETRY_LIMIT,
      retryBackoffMs: env.RETRY_BACKOFF_MS,
      runTimeoutMs: env.RUN_TIMEOUT_MS,
    },
    quality: {
      similarityThreshold: env.SIMILARITY_THRESHOLD,
      neighbors: env.SIMILARITY_NEIGHBORS,
    },
    dispatch: {
      toolTimeoutMs: env.TOOL_TIMEOUT_MS,
      toolConcurrency: env.TOOL_CONCURRENCY,
      toolRetryLimit: env.TOOL_RETRY_LIMIT,
      retryBackoffMs: env.RETRY_BACKOFF_MS,
    },
    research: {
      searchTool: env.SEARCH_TOOL,
      maxSearchQueries: env.MAX_SEARCH_QUERIES,
      searchWindowDays: env.SEARCH_WINDOW_DAYS,
    },
    publish: {
      publishTool: env.PUBLISH_TOOL,
      organizationUrn: env.ORGANIZATION_URN,
      visibility: env.VISIBILITY,
      lifecycleState: env.LIFECYCLE_STATE,
    },
    llm: {
      apiKey: env.LLM_API_KEY,
      baseUrl: env.LLM_BASE_URL,
      model: env.LLM_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
      maxTokens: env.LLM_MAX_TOKENS,
    },
    providers: providersFrom(env),
    exaApiKey: env.EXA_API_KEY,
  };
}
