import { Injectable, Logger } from '@nestjs/common';
import { ChatReplyPayload, IntentType } from '@cottage-concierge/shared-types';

import { ConversationSettings } from '../config/conversation-settings.service';
import { ContextValue } from '../conversation/context-tracker';
import { IntentRouter } from '../conversation/intent-router.service';
import { isDirectBookingRequest } from '../conversation/query-cues';
import { SlotState } from '../conversation/slot-definitions';
import { LoggingService } from '../logging/logging.service';
import { CapacityQueryHandler } from '../pricing/capacity-query.handler';
import { PricingQueryHandler } from '../pricing/pricing-query.handler';
import { RecommendationEngine } from '../recommendations/recommendation.engine';
import { DocumentRelevanceFilter } from '../retrieval/document-relevance.filter';
import { QueryOptimizer } from '../retrieval/query-optimizer';
import { RetrievalService } from '../retrieval/retrieval.service';
import { documentSource, RetrievedDocument } from '../retrieval/retrieved-document';
import { Session } from '../sessions/session';
import { SessionRegistry } from '../sessions/session-registry.service';
import {
  AFFIRMATIVE_ANSWER,
  AFFIRMATIVE_FOLLOW_UP,
  AnswerFrame,
  bookingAcknowledgment,
  clarificationAnswer,
  greetingAnswer,
  HELP_ANSWER,
  NEGATIVE_ANSWER,
  NEGATIVE_FOLLOW_UP,
  noDocumentsAnswer,
  outOfScopeAnswer,
  STATEMENT_ANSWER,
} from './fixed-answers';
import { AnswerSource, GeneratedAnswer, ResponseGenerator } from './response-generator.service';

export type TurnSource = AnswerSource | 'fixed' | 'no_documents' | 'out_of_scope';

export type ChatStreamEvent = { type: 'chunk'; text: string } | { type: 'done'; reply: ChatReplyPayload };

/** Statements that carry new facts or a follow-up question rather than thanks. */
const FOLLOW_UP_STATEMENTS = ['we are', 'we have', 'we will', 'there are', 'i have', 'which cottage', 'what about', 'how about'];

interface PreparedTurn {
  intent: IntentType;
  /** Set when no generation is needed. */
  answer: string | null;
  source: TurnSource;
  documents: RetrievedDocument[];
  structuredAnswer: string | null;
  bookingRequest: boolean;
  slots: SlotState | null;
}

interface StructuredContext {
  answer: string;
  documents: RetrievedDocument[];
  keyPoints: Record<string, ContextValue>;
}

const NO_FRAME: AnswerFrame = { prefix: '', suffix: '' };

/**
 * Runs one guest turn end to end under the session lock: classification, slot tracking,
 * retrieval, structured pricing and capacity answers, generation and suggestions.
 */
@Injectable()
export class ChatOrchestrator {
  private readonly logger = new Logger(ChatOrchestrator.name);

  constructor(
    private readonly sessions: SessionRegistry,
    private readonly router: IntentRouter,
    private readonly pricing: PricingQueryHandler,
    private readonly capacity: CapacityQueryHandler,
    private readonly optimizer: QueryOptimizer,
    private readonly retrieval: RetrievalService,
    private readonly relevance: DocumentRelevanceFilter,
    private readonly responses: ResponseGenerator,
    private readonly recommendations: RecommendationEngine,
    private readonly settings: ConversationSettings,
    private readonly loggingService: LoggingService,
  ) {}

  reply(sessionId: string, message: string): Promise<ChatReplyPayload> {
    return this.sessions.withSession(sessionId, async (session) => {
      const started = Date.now();
      const turn = await this.prepare(session, message);
      if (turn.answer !== null) {
        return this.finish(session, message, turn, turn.answer, turn.source, started);
      }

      const generated = await this.responses.generate(
        message,
        turn.documents,
        session.history,
        turn.structuredAnswer,
        session.context.describeGuest(),
      );
      const frame = this.frameFor(session, message, turn);
      return this.finish(session, message, turn, `${frame.prefix}${generated.answer}${frame.suffix}`, generated.source, started);
    });
  }

  /**
   * Same turn as `reply`, emitted as it is produced. Chunks are the raw model output; the
   * `done` event carries the cleaned answer.
   */
  streamReply(sessionId: string, message: string, emit: (event: ChatStreamEvent) => void): Promise<ChatReplyPayload> {
    return this.sessions.withSession(sessionId, async (session) => {
      const started = Date.now();
      const turn = await this.prepare(session, message);

      let reply: ChatReplyPayload;
      if (turn.answer !== null) {
        emit({ type: 'chunk', text: turn.answer });
        reply = this.finish(session, message, turn, turn.answer, turn.source, started);
      } else {
        const frame = this.frameFor(session, message, turn);
        if (frame.prefix) {
          emit({ type: 'chunk', text: frame.prefix });
        }
        const generated = await this.streamAnswer(session, message, turn, emit);
        if (frame.suffix) {
          emit({ type: 'chunk', text: frame.suffix });
        }
        reply = this.finish(session, message, turn, `${frame.prefix}${generated.answer}${frame.suffix}`, generated.source, started);
      }

      emit({ type: 'done', reply });
      return reply;
    });
  }

  private async prepare(session: Session, message: string): Promise<PreparedTurn> {
    const intent = await this.router.classify(message, session.history);

    switch (intent) {
      case 'greeting':
        return this.fixed(intent, greetingAnswer(this.settings));
      case 'help':
        return this.fixed(intent, HELP_ANSWER);
      case 'affirmative':
        return this.fixed(
          intent,
          this.router.lastAnswerAskedForMore(session.history) ? AFFIRMATIVE_FOLLOW_UP : AFFIRMATIVE_ANSWER,
        );
      case 'negative':
        return this.fixed(
          intent,
          this.router.lastAnswerAskedForMore(session.history) ? NEGATIVE_FOLLOW_UP : NEGATIVE_ANSWER,
        );
      case 'clarification_needed':
        return this.fixed(intent, clarificationAnswer(this.router.getClarificationQuestion(message)));
      case 'statement':
        if (!this.isFollowUpStatement(message)) {
          return this.fixed(intent, STATEMENT_ANSWER);
        }
        return this.answerTopic(session, message, this.router.refineTopic(message));
      default:
        return this.answerTopic(session, message, intent);
    }
  }

  private async answerTopic(session: Session, message: string, intent: IntentType): Promise<PreparedTurn> {
    const extracted = await session.slots.extractSlots(message, intent);
    session.slots.updateSlots(extracted);
    session.context.addIntent(intent);
    session.context.updatePreferences(this.preferencesFrom(session.slots.getSlots()));

    // Only carry the remembered cottage into turns that are about it.
    const slots: SlotState = { ...session.slots.getSlots(), cottageId: session.slots.cottageFor(message, intent) };

    const retrieved = await this.retrieve(message, intent);
    const outcome = this.relevance.filterAndPrioritize(
      this.relevance.prioritizeCottageDocuments(retrieved, message),
      message,
    );

    const base = { intent, structuredAnswer: null, bookingRequest: false, slots, documents: [] };
    if (outcome.status === 'rejected') {
      this.logger.log(`Rejected documents for session ${session.id}: ${outcome.reason}`);
      return { ...base, answer: outOfScopeAnswer(this.settings, message, outcome.reason), source: 'out_of_scope' };
    }

    const structured = this.structuredContext(message, slots, outcome.documents);
    for (const [key, value] of Object.entries(structured?.keyPoints ?? {})) {
      session.context.addKeyPoint(key, value);
    }
    const documents = structured?.documents ?? outcome.documents;
    if (documents.length === 0) {
      return { ...base, answer: noDocumentsAnswer(this.settings), source: 'no_documents' };
    }

    return {
      ...base,
      answer: null,
      source: 'completion',
      documents,
      structuredAnswer: structured?.answer ?? null,
      bookingRequest: isDirectBookingRequest(message),
    };
  }

  private structuredContext(
    message: string,
    slots: SlotState,
    documents: RetrievedDocument[],
  ): StructuredContext | null {
    if (this.pricing.isPricingQuery(message)) {
      const result = this.pricing.processPricingQuery(message, slots, documents);
      return {
        answer: result.answer,
        documents: this.pricing.enhanceContext(documents, result),
        keyPoints:
          result.status === 'computed'
            ? {
                quotedCottage: result.quote.cottage,
                quotedNights: result.quote.nights,
                quotedTotal: result.quote.totalPrice,
              }
            : {},
      };
    }

    if (this.capacity.isCapacityQuery(message)) {
      const result = this.capacity.processCapacityQuery(message);
      return {
        answer: result.answer,
        documents: this.capacity.enhanceContext(documents, result),
        keyPoints:
          result.status === 'compared' ? { checkedCottage: result.cottage, checkedGroupSize: result.groupSize } : {},
      };
    }

    return null;
  }

  /** Refined query first, then the guest's own words if that found nothing. */
  private async retrieve(message: string, intent: IntentType): Promise<RetrievedDocument[]> {
    const refined = await this.optimizer.refine(message, intent);
    const filter = this.optimizer.buildFilter(intent, this.optimizer.extractEntities(message));
    const limit = this.optimizer.retrievalDepth(message);

    for (const query of refined === message ? [message] : [refined, message]) {
      const result = await this.retrieval.search(query, limit, filter);
      if (!result.ok) {
        this.logger.warn(`Retrieval failed (${result.error.reason}): ${result.error.message}`);
        return [];
      }
      if (result.value.length > 0) {
        return result.value;
      }
    }
    return [];
  }

  private async streamAnswer(
    session: Session,
    message: string,
    turn: PreparedTurn,
    emit: (event: ChatStreamEvent) => void,
  ): Promise<GeneratedAnswer> {
    const stream = await this.responses.stream(
      message,
      turn.documents,
      session.history,
      session.context.describeGuest(),
    );
    if (!stream.ok) {
      this.logger.warn(`Streaming unavailable (${stream.error.reason}), using template fallback`);
    } else {
      let raw = '';
      try {
        for await (const chunk of stream.value) {
          raw += chunk;
          emit({ type: 'chunk', text: chunk });
        }
      } catch (error) {
        this.logger.error('Answer stream broke off', error instanceof Error ? error.stack : String(error));
      }

      const answer = this.responses.clean(raw);
      if (answer) {
        return { answer, source: 'completion' };
      }
    }

    const fallback = this.responses.fallback(turn.documents, turn.structuredAnswer);
    emit({ type: 'chunk', text: fallback.answer });
    return fallback;
  }

  private frameFor(session: Session, message: string, turn: PreparedTurn): AnswerFrame {
    if (turn.bookingRequest) {
      return bookingAcknowledgment(this.settings);
    }
    if (!turn.slots) {
      return NO_FRAME;
    }

    const followUp = this.recommendations.composeFollowUp(message, turn.intent, turn.slots, session.context);
    return followUp ? { prefix: '', suffix: `\n\n${followUp}` } : NO_FRAME;
  }

  private finish(
    session: Session,
    message: string,
    turn: PreparedTurn,
    answer: string,
    source: TurnSource,
    started: number,
  ): ChatReplyPayload {
    session.history.append(message, answer);
    if (turn.slots) {
      session.context.addToSummary(`${turn.intent}: ${message}`);
    }
    const slots = session.slots.toView();
    const state = session.context.getState();

    this.loggingService.logTurn(session.id, message, {
      intent: turn.intent,
      state,
      answerSource: source,
      slots,
      durationMs: Date.now() - started,
    });

    return {
      sessionId: session.id,
      intent: turn.intent,
      answer,
      suggestions: this.recommendations.generateContextualSuggestions(
        session.context,
        turn.slots ?? session.slots.getSlots(),
        session.history,
      ),
      slots,
      state,
      sources: [...new Set(turn.documents.map(documentSource))],
    };
  }

  private preferencesFrom(slots: SlotState): Record<string, ContextValue> {
    const preferences: Record<string, ContextValue> = {};
    if (slots.guests !== null) {
      preferences.guests = slots.guests;
    }
    if (slots.family !== null) {
      preferences.family = slots.family;
    }
    if (slots.budget !== null) {
      preferences.budget = slots.budget;
    }
    if (slots.preferences !== null) {
      preferences.preferences = slots.preferences;
    }
    return preferences;
  }

  private fixed(intent: IntentType, answer: string): PreparedTurn {
    return {
      intent,
      answer,
      source: 'fixed',
      documents: [],
      structuredAnswer: null,
      bookingRequest: false,
      slots: null,
    };
  }

  private isFollowUpStatement(message: string): boolean {
    const normalized = message.toLowerCase().trim();
    return FOLLOW_UP_STATEMENTS.some((phrase) => normalized.startsWith(phrase));
  }
}
