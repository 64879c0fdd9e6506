import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StoreUnavailableError } from '../errors';
import { KeyedLock } from '../session/keyedLock';
import { isNotFound, toolResultEnvelopeSchema } from '../session/store';
import type { ToolResultEnvelope } from '../types';

export type LedgerState = 'in_flight' | 'completed' | 'failed' | 'ambiguous';

export interface LedgerRecord {
  key: string;
  sessionId: string;
  tool: string;
  transactionKey: string;
  state: LedgerState;
  /** Incremented on every successful compare-and-set; 1 for a fresh record. */
  version: number;
  envelope?: ToolResultEnvelope;
  updatedAt: string;
}

export type LedgerUpdate = Pick<LedgerRecord, 'sessionId' | 'tool' | 'transactionKey' | 'state' | 'envelope'>;

/**
 * Durable record of write-once tool transactions, shared by the tool executor
 * and asynchronous callbacks such as payment webhooks.
 */
export interface IdempotencyStore {
  get(key: string): Promise<LedgerRecord | null>;
  /**
   * Writes `next` only if the stored version equals `expectedVersion`
   * (`null`: no record yet). Returns the new record, or null on conflict.
   */
  compareAndSet(key: string, expectedVersion: number | null, next: LedgerUpdate): Promise<LedgerRecord | null>;
  listForSession(sessionId: string, tool: string): Promise<LedgerRecord[]>;
}

export function ledgerKey(sessionId: string, tool: string, transactionKey: string): string {
  return `${sessionId}:${tool}:${transactionKey}`;
}

const ledgerRecordSchema = z.object({
  key: z.string().min(1),
  sessionId: z.string(),
  tool: z.string(),
  transactionKey: z.string(),
  state: z.enum(['in_flight', 'completed', 'failed', 'ambiguous']),
  version: z.number().int().positive(),
  envelope: toolResultEnvelopeSchema.optional(),
  updatedAt: z.string(),
});

function nextRecord(key: string, current: LedgerRecord | null, update: LedgerUpdate, now: Date): LedgerRecord {
  return {
    key,
    ...update,
    version: (current?.version ?? 0) + 1,
    updatedAt: now.toISOString(),
  };
}

function decodeRecord(raw: string, source: string): LedgerRecord {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new StoreUnavailableError(`Ledger record ${source} is not valid JSON`, 'ledger.read', error);
  }
  const result = ledgerRecordSchema.safeParse(decoded);
  if (!result.success) {
    throw new StoreUnavailableError(`Ledger record ${source} failed validation: ${result.error.message}`, 'ledger.read');
  }
  return result.data;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly records = new Map<string, string>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async get(key: string): Promise<LedgerRecord | null> {
    const raw = this.records.get(key);
    return raw === undefined ? null : decodeRecord(raw, key);
  }

  async compareAndSet(key: string, expectedVersion: number | null, next: LedgerUpdate): Promise<LedgerRecord | null> {
    // No await between the read and the write: the check-and-write is one step.
    const raw = this.records.get(key);
    const current = raw === undefined ? null : decodeRecord(raw, key);
    if ((current?.version ?? null) !== expectedVersion) {
      return null;
    }
    const record = nextRecord(key, current, next, this.clock());
    this.records.set(key, JSON.stringify(record));
    return record;
  }

  async listForSession(sessionId: string, tool: string): Promise<LedgerRecord[]> {
    return [...this.records.values()]
      .map((raw) => decodeRecord(raw, 'memory'))
      .filter((record) => record.sessionId === sessionId && record.tool === tool);
  }
}

/** One JSON file per ledger key; compare-and-set is serialized per key. */
export class FileIdempotencyStore implements IdempotencyStore {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly directory: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async get(key: string): Promise<LedgerRecord | null> {
    return this.read(key);
  }

  async compareAndSet(key: string, expectedVersion: number | null, next: LedgerUpdate): Promise<LedgerRecord | null> {
    return this.lock.run(key, async () => {
      const current = await this.read(key);
      if ((current?.version ?? null) !== expectedVersion) {
        return null;
      }
      const record = nextRecord(key, current, next, this.clock());
      await this.write(record);
      return record;
    });
  }

  async listForSession(sessionId: string, tool: string): Promise<LedgerRecord[]> {
    const prefix = encodeURIComponent(`${sessionId}:${tool}:`);
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new StoreUnavailableError(`Failed to list ledger directory ${this.directory}`, 'ledger.list', error);
    }

    const records: LedgerRecord[] = [];
    for (const name of names) {
      if (!name.startsWith(prefix) || !name.endsWith('.json')) {
        continue;
      }
      const record = await this.read(decodeURIComponent(name.slice(0, -'.json'.length)));
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  private filePath(key: string): string {
    return path.join(this.directory, `${encodeURIComponent(key)}.json`);
  }

  private async read(key: string): Promise<LedgerRecord | null> {
    const filePath = this.filePath(key);
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StoreUnavailableError(`Failed to read ledger record ${key}`, 'ledger.read', error);
    }
    return decodeRecord(raw, filePath);
  }

  private async write(record: LedgerRecord): Promise<void> {
    const filePath = this.filePath(record.key);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, JSON.stringify(record), 'utf8');
      await rename(tempPath, filePath);
    } catch (error) {
      throw new StoreUnavailableError(`Failed to persist ledger record ${record.key}`, 'ledger.write', error);
    }
  }
}
