import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Checkpoint, EpisodicRecord, SimilarityMatch } from '../types/workflow.js';
import { CheckpointSchema, EpisodicRecordSchema } from '../types/schemas.js';
import { ConfigurationError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';
import { rankBySimilarity } from './similarity.js';

const log = createLogger('episodic-store');

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Append-only log of run checkpoints. */
export interface CheckpointLog {
  checkpoint(checkpoint: Checkpoint): Promise<void>;
  loadLatestCheckpoint(runId: string): Promise<Checkpoint | null>;
  listCheckpoints(runId: string): Promise<Checkpoint[]>;
}

/** Embeddings of published articles, queried by the quality gate. */
export interface SimilarityIndex {
  recordArticle(record: EpisodicRecord): Promise<void>;
  nearestNeighbors(vector: number[], k: number): Promise<SimilarityMatch[]>;
  hasRecord(runId: string): Promise<boolean>;
}

/**
 * What the engine needs: the checkpoint log plus one operation that writes a
 * publication's episodic record together with the run's final checkpoint.
 */
export interface RunLedger extends CheckpointLog {
  commitPublication(checkpoint: Checkpoint, record: EpisodicRecord): Promise<void>;
}

/**
 * File-backed episodic store. One directory holds both the checkpoint log
 * (`checkpoints/<runId>.jsonl`, one checkpoint per line) and the article
 * records (`articles/<runId>.json`, at most one per run).
 *
 * Writes for the same run are serialised through a per-run queue; similarity
 * reads never wait on them.
 */
export class EpisodicStore implements RunLedger, SimilarityIndex {
  private readonly checkpointDir: string;
  private readonly articleDir: string;
  private readonly writeQueues = new Map<string, Promise<void>>();
  private records: Map<string, EpisodicRecord> | null = null;

  constructor(private readonly dir: string) {
    this.checkpointDir = path.join(dir, 'checkpoints');
    this.articleDir = path.join(dir, 'articles');
  }

  /** Create the store directories. Call at startup for fail-fast. */
  async initialize(): Promise<void> {
    await fs.mkdir(this.checkpointDir, { recursive: true });
    await fs.mkdir(this.articleDir, { recursive: true });
    log.info('Episodic store ready', { dir: this.dir });
  }

  async checkpoint(checkpoint: Checkpoint): Promise<void> {
    this.validateId(checkpoint.runId);
    await this.serialize(checkpoint.runId, () => this.appendCheckpoint(checkpoint));
  }

  /** Latest readable checkpoint; a torn trailing line from a crash is skipped. */
  async loadLatestCheckpoint(runId: string): Promise<Checkpoint | null> {
    const checkpoints = await this.listCheckpoints(runId);
    return checkpoints.length > 0 ? checkpoints[checkpoints.length - 1] : null;
  }

  async listCheckpoints(runId: string): Promise<Checkpoint[]> {
    this.validateId(runId);
    let data: string;
    try {
      data = await fs.readFile(this.checkpointPath(runId), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const checkpoints: Checkpoint[] = [];
    for (const [index, line] of data.split('\n').entries()) {
      if (!line.trim()) continue;
      const parsed = parseJsonLine(line);
      const result = CheckpointSchema.safeParse(parsed);
      if (result.success) {
        checkpoints.push(result.data);
      } else {
        log.warn('Skipping unreadable checkpoint line', { runId, line: index + 1 });
      }
    }
    return checkpoints;
  }

  async recordArticle(record: EpisodicRecord): Promise<void> {
    this.validateId(record.runId);
    await this.serialize(record.runId, () => this.writeRecord(record));
  }

  async hasRecord(runId: string): Promise<boolean> {
    const records = await this.loadRecords();
    return records.has(runId);
  }

  async nearestNeighbors(vector: number[], k: number): Promise<SimilarityMatch[]> {
    const records = await this.loadRecords();
    return rankBySimilarity(vector, records.values(), k);
  }

  /**
   * Writes the run's episodic record, then its final checkpoint, under the
   * run's write lock. A record that already exists for the run (a resumed
   * commit) is kept as is.
   */
  async commitPublication(checkpoint: Checkpoint, record: EpisodicRecord): Promise<void> {
    this.validateId(checkpoint.runId);
    if (record.runId !== checkpoint.runId) {
      throw new ConfigurationError(`Record for run ${record.runId} cannot commit with run ${checkpoint.runId}`);
    }
    await this.serialize(checkpoint.runId, async () => {
      const records = await this.loadRecords();
      if (!records.has(record.runId)) {
        await this.writeRecord(record);
      }
      await this.appendCheckpoint(checkpoint);
    });
    log.info('Publication committed', { runId: record.runId, step: checkpoint.step });
  }

  private async appendCheckpoint(checkpoint: Checkpoint): Promise<void> {
    await fs.appendFile(this.checkpointPath(checkpoint.runId), JSON.stringify(checkpoint) + '\n', 'utf-8');
    log.debug('Checkpoint saved', {
      runId: checkpoint.runId,
      step: checkpoint.step,
      node: checkpoint.nodeName,
      status: checkpoint.status,
    });
  }

  private async writeRecord(record: EpisodicRecord): Promise<void> {
    const records = await this.loadRecords();
    // 'wx' refuses to overwrite: records are immutable once written.
    await fs.writeFile(this.articlePath(record.runId), JSON.stringify(record), { encoding: 'utf-8', flag: 'wx' });
    records.set(record.runId, record);
    log.info('Episodic record written', { runId: record.runId, dimensions: record.embeddingVector.length });
  }

  private async loadRecords(): Promise<Map<string, EpisodicRecord>> {
    if (this.records) return this.records;

    const records = new Map<string, EpisodicRecord>();
    let entries: string[];
    try {
      entries = await fs.readdir(this.articleDir);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      entries = [];
    }

    for (const entry of entries.filter((name) => name.endsWith('.json')).sort()) {
      const file = path.join(this.articleDir, entry);
      try {
        const result = EpisodicRecordSchema.safeParse(JSON.parse(await fs.readFile(file, 'utf-8')));
        if (result.success) {
          records.set(result.data.runId, result.data);
        } else {
          log.warn('Ignoring malformed episodic record', { file });
        }
      } catch (err) {
        log.warn('Failed to read episodic record', { file, error: errorMessage(err) });
      }
    }

    this.records = records;
    log.debug('Episodic records loaded', { count: records.size });
    return records;
  }

  private serialize(runId: string, task: () => Promise<void>): Promise<void> {
    const previous = this.writeQueues.get(runId) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(task);
    this.writeQueues.set(runId, next);
    const cleanup = () => {
      if (this.writeQueues.get(runId) === next) this.writeQueues.delete(runId);
    };
    void next.then(cleanup, cleanup);
    return next;
  }

  private checkpointPath(runId: string): string {
    return path.join(this.checkpointDir, `${runId}.jsonl`);
  }

  private articlePath(runId: string): string {
    return path.join(this.articleDir, `${runId}.json`);
  }

  private validateId(runId: string): void {
    if (!UUID_RE.test(runId)) {
      throw new ConfigurationError(`Invalid run ID format: ${runId}`);
    }
  }
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
