import type { CapabilityClient, ToolError, ToolOutcome } from './capability-client.js';
import type { DispatchConfig } from '../config.js';
import type { ToolCall, ToolCallResult } from '../types/workflow.js';
import { ConfigurationError, WorkflowError, isTransientError } from '../errors.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { TimeoutError, backoffDelay, sleep, withTimeout } from '../utils/retry.js';
import { createLogger, errorMessage } from '../logger.js';

const log = createLogger('tool-dispatcher');

/**
 * Executes a batch of tool calls against the capability client. Calls run
 * concurrently up to the configured limit; each one ends up as exactly one
 * result, so a single failure never sinks the batch.
 *
 * Cancellation is cooperative: calls not yet started, or waiting for a
 * retry, are recorded as canceled; calls already in flight are left to
 * finish or hit their timeout.
 */
export class ToolDispatcher {
  constructor(
    private readonly client: CapabilityClient,
    private readonly config: DispatchConfig,
  ) {}

  async dispatch(calls: readonly ToolCall[], signal?: AbortSignal): Promise<ToolCallResult[]> {
    if (calls.length === 0) return [];

    const available = new Set((await this.client.listTools()).map((tool) => tool.name));
    const missing = [...new Set(calls.filter((call) => !available.has(call.tool)).map((call) => call.tool))];
    if (missing.length > 0) {
      throw new ConfigurationError(`No capability provider offers: ${missing.join(', ')}`);
    }

    const start = Date.now();
    const results = await mapWithConcurrency(calls, this.config.toolConcurrency, (call) => this.execute(call, signal));
    log.info('Batch complete', {
      calls: calls.length,
      failed: results.filter((r) => !r.ok).length,
      durationMs: Date.now() - start,
    });
    return results;
  }

  private async execute(call: ToolCall, signal?: AbortSignal): Promise<ToolCallResult> {
    let lastError: ToolError = { kind: 'canceled', message: 'Canceled before the call started' };

    for (let attempt = 0; attempt <= this.config.toolRetryLimit; attempt++) {
      if (signal?.aborted) {
        if (attempt > 0) {
          lastError = { kind: 'canceled', message: `Canceled before retrying after: ${lastError.message}` };
        }
        break;
      }
      if (attempt > 0) {
        const delay = backoffDelay(attempt - 1, this.config.retryBackoffMs);
        log.info('Retrying tool call', { callId: call.id, tool: call.tool, attempt: attempt + 1, delayMs: delay });
        await sleep(delay);
      }

      const outcome = await this.invokeOnce(call, signal);
      if (outcome.ok) {
        return { callId: call.id, tool: call.tool, requestedBy: call.requestedBy, ok: true, output: outcome.output };
      }
      lastError = outcome.error;
      if (outcome.error.kind !== 'retryable') break;
    }

    log.warn('Tool call failed', { callId: call.id, tool: call.tool, kind: lastError.kind, error: lastError.message });
    return { callId: call.id, tool: call.tool, requestedBy: call.requestedBy, ok: false, error: lastError };
  }

  private async invokeOnce(call: ToolCall, signal?: AbortSignal): Promise<ToolOutcome> {
    const timeoutMs = this.config.toolTimeoutMs;
    try {
      return await withTimeout(
        this.client.invoke(call.tool, call.args, { timeoutMs }),
        timeoutMs,
        `${call.tool} did not answer within ${timeoutMs}ms`,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { ok: false, error: { kind: signal?.aborted ? 'canceled' : 'timeout', message: error.message } };
      }
      if (error instanceof WorkflowError) {
        if (!error.retryable) throw error;
        return { ok: false, error: { kind: 'retryable', message: error.message } };
      }
      return { ok: false, error: { kind: isTransientError(error) ? 'retryable' : 'failed', message: errorMessage(error) } };
    }
  }
}
