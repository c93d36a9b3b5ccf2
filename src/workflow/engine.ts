import type { EngineConfig } from '../config.js';
import type { RunLedger } from '../services/episodic-store.js';
import {
  ConfigurationError,
  InternalError,
  PreconditionViolation,
  PublicationUnrecorded,
  RunCanceled,
  RunExceededStepBudget,
  RunTimedOut,
  type WorkflowError,
  toWorkflowError,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import {
  END,
  type Checkpoint,
  type CheckpointError,
  type CheckpointStatus,
  type NextNode,
  type NodeName,
  type RunState,
} from '../types/workflow.js';
import { TimeoutError, withRetry, withTimeout } from '../utils/retry.js';
import type { NodeResult, WorkflowNode } from './node.js';
import { DEFAULT_TRANSITIONS, resolveTransition, type TransitionTable } from './transitions.js';

const baseLog = createLogger('engine');

export type NodeRegistry = Readonly<Record<NodeName, WorkflowNode>>;

export interface WorkflowEngineDeps {
  nodes: NodeRegistry;
  ledger: RunLedger;
  config: EngineConfig;
  transitions?: TransitionTable;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export type RunOutcome =
  | { status: 'completed'; state: RunState; steps: number }
  | { status: 'failed'; state: RunState; steps: number; error: CheckpointError }
  | { status: 'canceled'; state: RunState; steps: number };

/** Where the step loop picks up: the state, the node to invoke, the last step written. */
interface Cursor {
  state: RunState;
  current: NodeName;
  lastNode: NodeName;
  step: number;
}

/**
 * Drives one run through the graph: invoke the current node, resolve its
 * hint through the transition table, checkpoint, repeat. Steps are strictly
 * sequential and a step is never taken past an unpersisted checkpoint.
 */
export class WorkflowEngine {
  private readonly transitions: TransitionTable;
  private readonly now: () => Date;

  constructor(private readonly deps: WorkflowEngineDeps) {
    this.transitions = deps.transitions ?? DEFAULT_TRANSITIONS;
    this.now = deps.now ?? (() => new Date());
  }

  /** Starts a new run from `initial`. The run ID must not have been used before. */
  async run(initial: RunState, options: RunOptions = {}): Promise<RunOutcome> {
    const existing = await this.deps.ledger.loadLatestCheckpoint(initial.runId);
    if (existing) {
      throw new ConfigurationError(`Run ${initial.runId} already has checkpoints; resume it instead`);
    }
    baseLog.info('Starting run', { runId: initial.runId, topic: initial.topic });
    return this.drive({ state: initial, current: 'supervisor', lastNode: 'supervisor', step: 0 }, options);
  }

  /**
   * Continues a run from its latest checkpoint. Terminal runs are reported
   * as they are, except a failed run whose publication was never recorded:
   * only the record commit is retried, the publisher is never re-invoked.
   */
  async resume(runId: string, options: RunOptions = {}): Promise<RunOutcome> {
    const latest = await this.deps.ledger.loadLatestCheckpoint(runId);
    if (!latest) {
      throw new ConfigurationError(`No checkpoint found for run ${runId}`);
    }
    const log = baseLog.child({ runId });
    const state = latest.stateSnapshot;

    switch (latest.status) {
      case 'completed':
        log.info('Run already completed', { step: latest.step });
        return { status: 'completed', state, steps: latest.step };

      case 'failed':
        if (state.publication) {
          log.info('Re-committing unrecorded publication', { step: latest.step });
          return this.commitPublication(state, latest.step + 1, log);
        }
        log.info('Run already failed', { step: latest.step, error: latest.error });
        return {
          status: 'failed',
          state,
          steps: latest.step,
          error: latest.error ?? { kind: 'InternalError', message: 'Failed without a recorded error' },
        };

      case 'in-flight':
        return this.fail(
          state,
          latest.step + 1,
          latest.nodeName,
          new PreconditionViolation(
            'PublishOutcomeUnknown',
            `Run stopped while "${latest.nodeName}" was running; its side effect may have happened and will not be repeated`,
          ),
          log,
        );

      case 'running':
      case 'canceled':
        if (latest.nextNode === END) {
          return { status: 'completed', state, steps: latest.step };
        }
        log.info('Resuming run', { fromStep: latest.step, next: latest.nextNode });
        return this.drive({ state, current: latest.nextNode, lastNode: latest.nodeName, step: latest.step }, options);
    }
  }

  private async drive(cursor: Cursor, options: RunOptions): Promise<RunOutcome> {
    const { maxSteps, runTimeoutMs } = this.deps.config;
    const signal = options.signal ?? new AbortController().signal;
    const deadline = Date.now() + runTimeoutMs;
    let { state, current, lastNode, step } = cursor;
    const runLog = baseLog.child({ runId: state.runId });

    while (true) {
      if (signal.aborted) {
        const canceled = new RunCanceled(`Run canceled before step ${step + 1} ("${current}")`);
        runLog.info('Run canceled between steps', { step, next: current });
        try {
          await this.write(state, step + 1, lastNode, current, 'canceled', canceled.toRecord());
        } catch (error) {
          return this.fail(state, step + 1, lastNode, toWorkflowError(error), runLog);
        }
        return { status: 'canceled', state, steps: step + 1 };
      }
      if (Date.now() >= deadline) {
        return this.fail(state, step + 1, lastNode, new RunTimedOut(`Run exceeded ${runTimeoutMs}ms`), runLog);
      }
      if (step >= maxSteps) {
        return this.fail(state, step + 1, lastNode, new RunExceededStepBudget(`Run exceeded ${maxSteps} steps`), runLog);
      }

      const node = this.deps.nodes[current];
      const log = runLog.child({ step: step + 1, node: current });

      if (node.sideEffecting) {
        try {
          await this.write(state, step + 1, current, current, 'in-flight');
        } catch (error) {
          return this.fail(state, step + 1, current, toWorkflowError(error), log);
        }
        step += 1;
      }

      let result: NodeResult;
      let next: NextNode;
      try {
        result = await this.invoke(node, state, step + 1, deadline - Date.now(), signal, log);
        next = resolveTransition(this.transitions, current, result.hint);
      } catch (error) {
        const failure = error instanceof TimeoutError ? new RunTimedOut(error.message) : toWorkflowError(error);
        return this.fail(state, step + 1, current, failure, log);
      }

      step += 1;
      state = result.state;
      log.info('Step complete', { hint: result.hint, next });

      if (next === END) {
        if (result.hint === 'published') {
          return this.commitPublication(state, step, log);
        }
        try {
          await this.write(state, step, current, END, 'completed');
        } catch (error) {
          return this.fail(state, step + 1, current, toWorkflowError(error), log);
        }
        runLog.info('Run completed', { steps: step });
        return { status: 'completed', state, steps: step };
      }

      try {
        await this.write(state, step, current, next, 'running');
      } catch (error) {
        return this.fail(state, step + 1, current, toWorkflowError(error), log);
      }
      lastNode = current;
      current = next;
    }
  }

  /**
   * Invokes a node, retrying retryable failures from the unchanged pre-attempt
   * state. Side-effecting nodes get exactly one attempt and are not raced
   * against the run deadline: their own call timeout bounds them, and the
   * engine waits for the outcome it has to record.
   */
  private invoke(
    node: WorkflowNode,
    state: RunState,
    step: number,
    remainingMs: number,
    signal: AbortSignal,
    log: Logger,
  ): Promise<NodeResult> {
    const { nodeRetryLimit, retryBackoffMs } = this.deps.config;
    return withRetry(
      (attempt) => {
        const running = node.run(structuredClone(state), { runId: state.runId, step, attempt, signal, log });
        if (node.sideEffecting) return running;
        return withTimeout(
          running,
          Math.max(remainingMs, 1),
          `Run exceeded its time budget while "${node.name}" was running`,
        );
      },
      {
        retries: node.sideEffecting ? 0 : nodeRetryLimit,
        initialDelayMs: retryBackoffMs,
        signal,
        shouldRetry: (error) => !(error instanceof TimeoutError) && toWorkflowError(error).retryable,
        onRetry: (error, attempt, delayMs) =>
          log.warn('Node failed, retrying', { attempt, delayMs, error: toWorkflowError(error).message }),
      },
    );
  }

  /** Commits the episodic record together with the final checkpoint, written as `commitStep`. */
  private async commitPublication(state: RunState, commitStep: number, log: Logger): Promise<RunOutcome> {
    const { publication, draftEmbedding } = state;
    if (!publication || !draftEmbedding) {
      return this.fail(
        state,
        commitStep,
        'publisher',
        new InternalError('Publisher reported success without a publication and draft embedding'),
        log,
      );
    }

    const checkpoint = this.checkpointFor(state, commitStep, 'publisher', END, 'completed');
    try {
      await this.deps.ledger.commitPublication(checkpoint, {
        runId: state.runId,
        articleText: publication.articleText,
        embeddingVector: draftEmbedding,
        publishedAt: publication.publishedAt,
      });
    } catch (error) {
      const failure = new PublicationUnrecorded(
        `Article was published but its record could not be committed: ${toWorkflowError(error).message}`,
        { cause: error },
      );
      return this.fail(state, commitStep, 'publisher', failure, log);
    }
    log.info('Run completed with publication', { steps: commitStep, postId: publication.postId });
    return { status: 'completed', state, steps: commitStep };
  }

  /** Records the failure in a final checkpoint; a store that cannot take it is logged, not masked. */
  private async fail(
    state: RunState,
    step: number,
    nodeName: NodeName,
    error: WorkflowError,
    log: Logger,
  ): Promise<RunOutcome> {
    const record = error.toRecord();
    log.error('Run failed', { ...record });
    try {
      await this.write(state, step, nodeName, END, 'failed', record);
    } catch (writeError) {
      log.error('Could not persist the failure checkpoint', { error: toWorkflowError(writeError).message });
    }
    return { status: 'failed', state, steps: step, error: record };
  }

  private async write(
    state: RunState,
    step: number,
    nodeName: NodeName,
    nextNode: NextNode,
    status: CheckpointStatus,
    error?: CheckpointError,
  ): Promise<void> {
    await this.deps.ledger.checkpoint(this.checkpointFor(state, step, nodeName, nextNode, status, error));
  }

  private checkpointFor(
    state: RunState,
    step: number,
    nodeName: NodeName,
    nextNode: NextNode,
    status: CheckpointStatus,
    error?: CheckpointError,
  ): Checkpoint {
    const checkpoint: Checkpoint = {
      runId: state.runId,
      step,
      nodeName,
      nextNode,
      status,
      stateSnapshot: structuredClone(state),
      timestamp: this.now().toISOString(),
    };
    return error ? { ...checkpoint, error } : checkpoint;
  }
}
