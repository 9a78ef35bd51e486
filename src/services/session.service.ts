import { CaptureResult } from '../types';
import { SessionState, TurnResult } from '../types/graph';
import { FormSession } from '../models/FormSession';
import { advance, advanceWithCapture } from '../graph/graph';
import { createSession } from '../graph/state';
import { sanitizeInput, maskSensitiveData } from '../utils/security';
import { SessionNotFoundError } from '../core/errors';
import { config } from '../core/config';
import { logger } from '../core/logger';

export interface SessionStore {
  load(sessionId: string): Promise<SessionState | null>;
  save(session: SessionState): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
}

export class InMemorySessionStore implements SessionStore {
  private sessions: Map<string, SessionState> = new Map();

  async load(sessionId: string): Promise<SessionState | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async save(session: SessionState): Promise<void> {
    this.sessions.set(session.sessionId, structuredClone(session));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

function fromRecord(record: SessionState): SessionState {
  return {
    sessionId: record.sessionId,
    currentField: record.currentField,
    completedFields: record.completedFields,
    fieldValues: record.fieldValues,
    pendingValue: record.pendingValue,
    confirmationPending: record.confirmationPending,
    extractionAttempts: record.extractionAttempts,
    messages: record.messages.map(({ speaker, text }) => ({ speaker, text })),
    complete: record.complete,
    summaryAnnounced: record.summaryAnnounced,
    finalOutput: record.finalOutput,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

export class MongoSessionStore implements SessionStore {
  async load(sessionId: string): Promise<SessionState | null> {
    const record = await FormSession.findOne({ sessionId }).lean<SessionState>().exec();
    return record ? fromRecord(record) : null;
  }

  async save(session: SessionState): Promise<void> {
    await FormSession.updateOne({ sessionId: session.sessionId }, { $set: session }, { upsert: true }).exec();
  }

  async delete(sessionId: string): Promise<boolean> {
    const result = await FormSession.deleteOne({ sessionId }).exec();
    return result.deletedCount > 0;
  }
}

export function createSessionStore(kind: 'memory' | 'mongo' = config.sessions.store): SessionStore {
  logger.info('Creating session store', { kind });
  return kind === 'mongo' ? new MongoSessionStore() : new InMemorySessionStore();
}

/**
 * Owns the sessions of a process. Turns for the same session run strictly
 * one after another; different sessions never wait on each other.
 */
export class SessionService {
  private queues: Map<string, Promise<void>> = new Map();

  constructor(private store: SessionStore) {}

  async create(): Promise<SessionState> {
    const session = createSession();
    await this.store.save(session);
    logger.info('Session created', { sessionId: maskSensitiveData(session.sessionId) });
    return session;
  }

  async get(sessionId: string): Promise<SessionState> {
    const session = await this.store.load(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  async submitText(sessionId: string, text: string): Promise<TurnResult> {
    return this.serialize(sessionId, async () => {
      const session = await this.get(sessionId);
      const result = await advance(session, sanitizeInput(text));
      if (result.accepted) {
        await this.store.save(result.session);
      }
      return result;
    });
  }

  async submitCapture(sessionId: string, capture: CaptureResult): Promise<TurnResult> {
    return this.serialize(sessionId, async () => {
      const session = await this.get(sessionId);
      const result = await advanceWithCapture(session, {
        ...capture,
        text: capture.text === undefined ? undefined : sanitizeInput(capture.text),
      });
      if (result.accepted) {
        await this.store.save(result.session);
      }
      return result;
    });
  }

  /** Starts the conversation over under the same session id. */
  async reset(sessionId: string): Promise<SessionState> {
    return this.serialize(sessionId, async () => {
      await this.get(sessionId);
      const fresh = createSession(sessionId);
      await this.store.save(fresh);
      logger.info('Session reset', { sessionId: maskSensitiveData(sessionId) });
      return fresh;
    });
  }

  async remove(sessionId: string): Promise<void> {
    return this.serialize(sessionId, async () => {
      const deleted = await this.store.delete(sessionId);
      if (!deleted) {
        throw new SessionNotFoundError(sessionId);
      }
    });
  }

  private serialize<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(() => task());
    const tail = run.then(
      () => undefined,
      () => undefined
    );

    this.queues.set(sessionId, tail);
    void tail.then(() => {
      if (this.queues.get(sessionId) === tail) {
        this.queues.delete(sessionId);
      }
    });

    return run;
  }
}

export const sessionService = new SessionService(createSessionStore());
