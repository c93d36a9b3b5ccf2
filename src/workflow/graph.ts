import type { AppConfig } from '../config.js';
import type { CapabilityClient } from '../services/capability-client.js';
import type { RunLedger, SimilarityIndex } from '../services/episodic-store.js';
import type { Completer, Embedder } from '../services/llm-provider.js';
import { ToolDispatcher } from '../services/tool-dispatcher.js';
import { SupervisorNode, LlmSupervisorAdvisor } from '../nodes/supervisor.js';
import { ResearcherNode } from '../nodes/researcher.js';
import { ToolDispatchNode } from '../nodes/tool-dispatch.js';
import { WriterNode } from '../nodes/writer.js';
import { QualityNode } from '../nodes/quality.js';
import { PublisherNode } from '../nodes/publisher.js';
import { WorkflowEngine, type NodeRegistry } from './engine.js';
import { createLogger } from '../logger.js';

const log = createLogger('graph');

export type WorkflowConfig = Pick<
  AppConfig,
  'maxDuplicateVerdicts' | 'supervisorAdvisor' | 'engine' | 'quality' | 'dispatch' | 'research' | 'publish'
>;

/** Collaborators the graph runs against. */
export interface WorkflowServices {
  store: RunLedger & SimilarityIndex;
  capabilities: CapabilityClient;
  llm: Completer & Embedder;
  now?: () => Date;
}

export function buildNodes(config: WorkflowConfig, services: WorkflowServices): NodeRegistry {
  const { capabilities, llm, store, now } = services;
  const advisor = config.supervisorAdvisor === 'llm' ? new LlmSupervisorAdvisor(llm) : undefined;

  return {
    supervisor: new SupervisorNode({ maxDuplicateVerdicts: config.maxDuplicateVerdicts }, advisor),
    researcher: new ResearcherNode({ config: config.research, planner: llm, now }),
    toolDispatch: new ToolDispatchNode(new ToolDispatcher(capabilities, config.dispatch)),
    writer: new WriterNode(llm),
    quality: new QualityNode(llm, store, config.quality),
    publisher: new PublisherNode({
      capabilities,
      config: config.publish,
      timeoutMs: config.dispatch.toolTimeoutMs,
      now,
    }),
  };
}

/** Wires the six nodes into an engine over the default transition table. */
export function createWorkflowEngine(config: WorkflowConfig, services: WorkflowServices): WorkflowEngine {
  const nodes = buildNodes(config, services);
  log.info('Workflow assembled', {
    advisor: config.supervisorAdvisor,
    maxSteps: config.engine.maxSteps,
    similarityThreshold: config.quality.similarityThreshold,
  });
  return new WorkflowEngine({ nodes, ledger: services.store, config: config.engine, now: services.now });
}
