#!/usr/bin/env node
import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { loadConfig } from './config.js';
import { parseCliArgs } from './cli-args.js';
import { EpisodicStore } from './services/episodic-store.js';
import { createCapabilityRegistry } from './services/capability-backends/index.js';
import { LLMService } from './services/llm-provider.js';
import { DirectAPILLMProvider } from './services/llm-backends/direct-api.js';
import { createWorkflowEngine } from './workflow/graph.js';
import type { RunOutcome } from './workflow/engine.js';
import { createRunState } from './types/workflow.js';
import { setLogLevel, createLogger, errorMessage } from './logger.js';

const log = createLogger('main');

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info('Starting content supervisor', {
    nodeVersion: process.version,
    pid: process.pid,
    logLevel: config.logLevel,
    storeDir: config.storeDir,
  });

  const store = new EpisodicStore(config.storeDir);
  await store.initialize();

  const llm = new LLMService(new DirectAPILLMProvider(config.llm));
  await llm.initialize();

  const capabilities = createCapabilityRegistry(config.providers);
  const controller = new AbortController();

  const cleanup = async () => {
    await capabilities.close();
    try {
      await llm.dispose();
    } catch (error) {
      log.error('Error during cleanup', { error: errorMessage(error) });
    }
  };

  // First signal cancels between steps; a second one exits immediately.
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.warn('Second signal received, exiting', { signal });
      process.exit(130);
    }
    log.info('Cancel requested, stopping after the current step', { signal });
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection', { error: errorMessage(reason) });
  });

  try {
    await capabilities.connect();
    const engine = createWorkflowEngine(config, { store, capabilities, llm });

    const outcome = args.resume
      ? await engine.resume(args.resume, { signal: controller.signal })
      : await engine.run(createRunState(randomUUID(), args.topic ?? config.topic), { signal: controller.signal });

    process.stdout.write(`${JSON.stringify(summarize(outcome), null, 2)}\n`);
    process.exitCode = outcome.status === 'completed' ? 0 : outcome.status === 'canceled' ? 130 : 1;
  } finally {
    await cleanup();
  }
}

function summarize(outcome: RunOutcome): Record<string, unknown> {
  const { state } = outcome;
  return {
    runId: state.runId,
    status: outcome.status,
    steps: outcome.steps,
    topic: state.topic,
    verdict: state.qualityVerdict,
    similarity: state.similarity?.score,
    postId: state.publication?.postId,
    ...(outcome.status === 'failed' ? { error: outcome.error } : {}),
  };
}

main().catch((error: unknown) => {
  log.error('Run aborted', { error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined });
  process.exit(1);
});
