import { ChatHistory, ChatTurn } from '../conversation/chat-history';
import { ContextSnapshot, ContextTracker } from '../conversation/context-tracker';
import { SlotManager, SlotSnapshot } from '../conversation/slot-manager';

export const SESSION_SNAPSHOT_VERSION = 2;

/** Everything one guest conversation remembers between turns. */
export interface Session {
  readonly id: string;
  readonly history: ChatHistory;
  readonly slots: SlotManager;
  readonly context: ContextTracker;
}

export interface SessionSnapshot {
  version: typeof SESSION_SNAPSHOT_VERSION;
  sessionId: string;
  history: ChatTurn[];
  slots: SlotSnapshot;
  context: ContextSnapshot;
}

/** Shape written before slots were renamed; history lines read "question: ..., answer: ...". */
export interface LegacySessionSnapshot {
  session_id: string;
  chat_history?: string[];
  slots?: Record<string, unknown>;
  current_cottage?: string | number | null;
}

export type StoredSession = SessionSnapshot | LegacySessionSnapshot;

export const isLegacySnapshot = (snapshot: StoredSession): snapshot is LegacySessionSnapshot =>
  !('version' in snapshot);
