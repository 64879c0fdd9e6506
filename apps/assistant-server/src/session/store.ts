import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StoreUnavailableError } from '../errors';
import type { Session, Turn } from '../types';
import { KeyedLock } from './keyedLock';
import { mergeProfileBags, profileBagSchema, type ProfileBag } from './profile';

/**
 * Durable per-session memory. Every call reads from or writes to the backing
 * store; implementations raise StoreUnavailableError when it cannot be reached.
 */
export interface SessionStore {
  /** Returns the session, creating an empty one when absent. */
  load(sessionId: string): Promise<Session>;
  /** Appends a turn; appending a user turn advances the turn counter. */
  append(sessionId: string, turn: Turn): Promise<void>;
  getProfile(sessionId: string): Promise<ProfileBag>;
  mergeProfile(sessionId: string, patch: ProfileBag): Promise<ProfileBag>;
  ping(): Promise<void>;
}

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Payloads and tool inputs are stored as JSON, so they decode as JSON values. */
const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

export const toolResultEnvelopeSchema = z.union([
  z.object({
    status: z.literal('ok'),
    payload: jsonValueSchema,
    citation: z.string().optional(),
    cached: z.boolean().optional(),
  }),
  z.object({
    status: z.literal('error'),
    kind: z.enum(['InvalidInput', 'NotFound', 'Upstream', 'AmbiguousOutcome']),
    message: z.string(),
    retryable: z.boolean(),
    citation: z.string().optional(),
    cached: z.boolean().optional(),
  }),
]);

const turnSchema = z.union([
  z.object({
    role: z.literal('user'),
    content: z.string(),
    channel: z.string().optional(),
    createdAt: z.string(),
  }),
  z.object({
    role: z.literal('assistant'),
    content: z.string(),
    createdAt: z.string(),
  }),
  z.object({
    role: z.literal('tool'),
    toolName: z.string(),
    input: jsonValueSchema,
    result: toolResultEnvelopeSchema,
    createdAt: z.string(),
  }),
]);

export const sessionRecordSchema = z.object({
  id: z.string().min(1),
  turns: z.array(turnSchema),
  profile: profileBagSchema,
  turnCounter: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

function emptySession(sessionId: string, now: Date): Session {
  const ts = now.toISOString();
  return { id: sessionId, turns: [], profile: {}, turnCounter: 0, createdAt: ts, updatedAt: ts };
}

function withTurn(session: Session, turn: Turn, now: Date): Session {
  return {
    ...session,
    turns: [...session.turns, turn],
    turnCounter: turn.role === 'user' ? session.turnCounter + 1 : session.turnCounter,
    updatedAt: now.toISOString(),
  };
}

function withProfile(session: Session, patch: ProfileBag, now: Date): Session {
  return { ...session, profile: mergeProfileBags(session.profile, patch), updatedAt: now.toISOString() };
}

function parseRecord(raw: string, source: string): Session {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new StoreUnavailableError(`Session record ${source} is not valid JSON`, 'load', error);
  }
  const result = sessionRecordSchema.safeParse(decoded);
  if (!result.success) {
    throw new StoreUnavailableError(`Session record ${source} failed validation: ${result.error.message}`, 'load');
  }
  return result.data;
}

/**
 * Keeps serialized session records in process memory. Records are stored as
 * JSON text so callers never share mutable state with the store.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly records = new Map<string, string>();
  private readonly lock = new KeyedLock();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async load(sessionId: string): Promise<Session> {
    return this.lock.run(sessionId, async () => this.read(sessionId));
  }

  async append(sessionId: string, turn: Turn): Promise<void> {
    await this.lock.run(sessionId, async () => {
      this.write(withTurn(this.read(sessionId), turn, this.clock()));
    });
  }

  async getProfile(sessionId: string): Promise<ProfileBag> {
    return (await this.load(sessionId)).profile;
  }

  async mergeProfile(sessionId: string, patch: ProfileBag): Promise<ProfileBag> {
    return this.lock.run(sessionId, async () => {
      const next = withProfile(this.read(sessionId), patch, this.clock());
      this.write(next);
      return next.profile;
    });
  }

  async ping(): Promise<void> {}

  private read(sessionId: string): Session {
    const raw = this.records.get(sessionId);
    return raw === undefined ? emptySession(sessionId, this.clock()) : parseRecord(raw, sessionId);
  }

  private write(session: Session): void {
    this.records.set(session.id, JSON.stringify(session));
  }
}

/** One JSON document per session under `directory`, replaced atomically on write. */
export class FileSessionStore implements SessionStore {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly directory: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async load(sessionId: string): Promise<Session> {
    return this.lock.run(sessionId, () => this.read(sessionId));
  }

  async append(sessionId: string, turn: Turn): Promise<void> {
    await this.lock.run(sessionId, async () => {
      await this.write(withTurn(await this.read(sessionId), turn, this.clock()));
    });
  }

  async getProfile(sessionId: string): Promise<ProfileBag> {
    return (await this.load(sessionId)).profile;
  }

  async mergeProfile(sessionId: string, patch: ProfileBag): Promise<ProfileBag> {
    return this.lock.run(sessionId, async () => {
      const next = withProfile(await this.read(sessionId), patch, this.clock());
      await this.write(next);
      return next.profile;
    });
  }

  async ping(): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new StoreUnavailableError(`Session directory ${this.directory} is not writable`, 'ping', error);
    }
  }

  private filePath(sessionId: string): string {
    return path.join(this.directory, `${encodeURIComponent(sessionId)}.json`);
  }

  private async read(sessionId: string): Promise<Session> {
    const filePath = this.filePath(sessionId);
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return emptySession(sessionId, this.clock());
      }
      throw new StoreUnavailableError(`Failed to read session ${sessionId}`, 'load', error);
    }
    return parseRecord(raw, filePath);
  }

  private async write(session: Session): Promise<void> {
    const filePath = this.filePath(session.id);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, JSON.stringify(session), 'utf8');
      await rename(tempPath, filePath);
    } catch (error) {
      throw new StoreUnavailableError(`Failed to persist session ${session.id}`, 'write', error);
    }
  }
}

export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
