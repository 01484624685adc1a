import { Injectable, Logger } from '@nestjs/common';

import { Clock } from '../common/clock';
import { ConversationSettings } from '../config/conversation-settings.service';
import { ChatHistory } from '../conversation/chat-history';
import { ContextTracker } from '../conversation/context-tracker';
import { DateExtractor } from '../conversation/date-extractor';
import { NumberExtractor } from '../conversation/number-extractor';
import { SlotExtractionService } from '../conversation/slot-extraction.service';
import { SlotManager, SlotManagerDeps } from '../conversation/slot-manager';
import { LoggingService } from '../logging/logging.service';
import { migrateLegacySnapshot } from './legacy-slot-migration';
import { isLegacySnapshot, Session, SESSION_SNAPSHOT_VERSION, SessionSnapshot, StoredSession } from './session';

/**
 * In-memory sessions keyed by id. Work on one session runs one turn at a time through a
 * promise chain; different sessions never wait on each other.
 */
@Injectable()
export class SessionRegistry {
  private readonly logger = new Logger(SessionRegistry.name);
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly slotDeps: SlotManagerDeps;

  constructor(
    private readonly settings: ConversationSettings,
    private readonly loggingService: LoggingService,
    extraction: SlotExtractionService,
    numbers: NumberExtractor,
    dates: DateExtractor,
    clock: Clock,
  ) {
    this.slotDeps = { extraction, numbers, dates, clock };
  }

  get size(): number {
    return this.sessions.size;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  async withSession<T>(id: string, work: (session: Session) => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    const run = previous.then(() => work(this.getOrCreate(id)));
    // The next turn waits for this one to settle; its failure reaches the caller through `run`.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(id, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(id) === tail) {
        this.locks.delete(id);
      }
    }
  }

  getOrCreate(id: string): Session {
    const existing = this.sessions.get(id);
    if (existing) {
      return existing;
    }

    const session: Session = {
      id,
      history: new ChatHistory(this.settings.chatHistoryLength),
      slots: new SlotManager(id, this.slotDeps),
      context: new ContextTracker(id),
    };
    this.sessions.set(id, session);
    this.loggingService.logSessionEvent(id, 'created');
    return session;
  }

  /** Empties history, slots and context but keeps the session. */
  async clear(id: string): Promise<boolean> {
    if (!this.sessions.has(id)) {
      return false;
    }

    await this.withSession(id, (session) => {
      session.history.clear();
      session.slots.clearSlots();
      session.context.clear();
    });
    this.loggingService.logSessionEvent(id, 'cleared');
    return true;
  }

  async delete(id: string): Promise<boolean> {
    if (!this.sessions.has(id)) {
      return false;
    }

    await this.withSession(id, () => {
      this.sessions.delete(id);
    });
    this.loggingService.logSessionEvent(id, 'deleted');
    return true;
  }

  snapshot(id: string): SessionSnapshot | null {
    const session = this.sessions.get(id);
    if (!session) {
      return null;
    }

    return {
      version: SESSION_SNAPSHOT_VERSION,
      sessionId: id,
      history: session.history.turns(),
      slots: session.slots.snapshot(),
      context: session.context.snapshot(),
    };
  }

  /** Loads a stored session, migrating the pre-rename shape first. Replaces any live session. */
  restore(stored: StoredSession): Session {
    const snapshot = isLegacySnapshot(stored) ? migrateLegacySnapshot(stored, this.slotDeps.dates) : stored;
    const id = snapshot.sessionId;

    const session: Session = {
      id,
      history: new ChatHistory(this.settings.chatHistoryLength, snapshot.history),
      slots: SlotManager.restore(id, snapshot.slots, this.slotDeps),
      context: ContextTracker.restore(id, snapshot.context),
    };

    if (this.sessions.has(id)) {
      this.logger.warn(`Restoring session ${id} over a live session`);
    }
    this.sessions.set(id, session);
    this.loggingService.logSessionEvent(id, 'restored');
    return session;
  }
}
