import { Logger } from '@nestjs/common';
import { ConversationState, IntentType } from '@cottage-concierge/shared-types';

export type ContextValue = string | number | boolean;

export interface ContextSnapshot {
  state: ConversationState;
  intentHistory: IntentType[];
  preferences: Record<string, ContextValue>;
  keyPoints: Record<string, ContextValue>;
  summary: string[];
}

const INTENT_WINDOW = 10;
const SUMMARY_LIMIT = 20;
const ENQUIRY_INTENTS: readonly IntentType[] = ['pricing', 'availability', 'rooms'];

/** Where a guest is in their journey, and what they have asked about so far. */
export class ContextTracker {
  private readonly logger = new Logger(ContextTracker.name);
  private state: ConversationState = 'browsing';
  private intentHistory: IntentType[] = [];
  private preferences: Record<string, ContextValue> = {};
  private keyPoints: Record<string, ContextValue> = {};
  private summary: string[] = [];

  constructor(readonly sessionId: string) {}

  static restore(sessionId: string, snapshot: ContextSnapshot): ContextTracker {
    const tracker = new ContextTracker(sessionId);
    tracker.state = snapshot.state;
    tracker.intentHistory = snapshot.intentHistory.slice(-INTENT_WINDOW);
    tracker.preferences = { ...snapshot.preferences };
    tracker.keyPoints = { ...snapshot.keyPoints };
    tracker.summary = snapshot.summary.slice(-SUMMARY_LIMIT);
    return tracker;
  }

  getState(): ConversationState {
    return this.state;
  }

  updateState(next: ConversationState): void {
    if (this.state !== next) {
      this.logger.log(`Session ${this.sessionId} state: ${this.state} -> ${next}`);
      this.state = next;
    }
  }

  addIntent(intent: IntentType): void {
    const seenBefore = [...this.intentHistory];
    this.intentHistory.push(intent);
    if (this.intentHistory.length > INTENT_WINDOW) {
      this.intentHistory.shift();
    }

    if (intent === 'booking') {
      const compared = seenBefore.includes('pricing') || seenBefore.includes('availability');
      this.updateState(compared ? 'ready_to_book' : 'booking');
      return;
    }

    if (ENQUIRY_INTENTS.includes(intent)) {
      const recent = new Set(this.getRecentIntents(3));
      this.updateState(this.intentHistory.length >= 2 && recent.size >= 2 ? 'comparing' : 'inquiring');
    }
  }

  updatePreferences(preferences: Record<string, ContextValue>): void {
    this.preferences = { ...this.preferences, ...preferences };
  }

  getPreference(key: string): ContextValue | undefined {
    return this.preferences[key];
  }

  addKeyPoint(key: string, value: ContextValue): void {
    this.keyPoints[key] = value;
  }

  getKeyPoint(key: string): ContextValue | undefined {
    return this.keyPoints[key];
  }

  addToSummary(point: string): void {
    this.summary.push(point);
    if (this.summary.length > SUMMARY_LIMIT) {
      this.summary.shift();
    }
  }

  getSummary(maxPoints = 5): string {
    return this.summary.slice(-maxPoints).join('\n');
  }

  /** Preferences, key points and recent topics as prompt notes; empty while nothing is known. */
  describeGuest(maxPoints = 5): string {
    const pairs = (values: Record<string, ContextValue>) =>
      Object.entries(values)
        .map(([key, value]) => `${key}: ${value}`)
        .join(', ');

    const lines: string[] = [];
    if (Object.keys(this.preferences).length > 0) {
      lines.push(`Preferences: ${pairs(this.preferences)}`);
    }
    if (Object.keys(this.keyPoints).length > 0) {
      lines.push(`Key points: ${pairs(this.keyPoints)}`);
    }
    const summary = this.getSummary(maxPoints);
    if (summary) {
      lines.push(`Recent topics:\n${summary}`);
    }
    return lines.join('\n');
  }

  isReadyToBook(): boolean {
    if (this.state === 'ready_to_book') {
      return true;
    }
    return (
      this.intentHistory.includes('booking') &&
      (this.intentHistory.includes('pricing') || this.intentHistory.includes('availability'))
    );
  }

  getRecentIntents(count = 3): IntentType[] {
    return this.intentHistory.slice(-count);
  }

  getLastIntent(): IntentType | null {
    return this.intentHistory[this.intentHistory.length - 1] ?? null;
  }

  clear(): void {
    this.state = 'browsing';
    this.intentHistory = [];
    this.preferences = {};
    this.keyPoints = {};
    this.summary = [];
    this.logger.log(`Cleared context for session ${this.sessionId}`);
  }

  snapshot(): ContextSnapshot {
    return {
      state: this.state,
      intentHistory: [...this.intentHistory],
      preferences: { ...this.preferences },
      keyPoints: { ...this.keyPoints },
      summary: [...this.summary],
    };
  }
}
