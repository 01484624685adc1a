import { Injectable, Logger } from '@nestjs/common';

import { Result } from '../common/result';
import { ConversationSettings } from '../config/conversation-settings.service';
import { ChatHistory } from '../conversation/chat-history';
import { CompletionClient, CompletionError } from '../llm/completion-client';
import { RetrievedDocument } from '../retrieval/retrieved-document';
import { AnswerCleaner } from './answer-cleaner';

export type AnswerSource = 'completion' | 'structured' | 'document';

export interface GeneratedAnswer {
  answer: string;
  source: AnswerSource;
}

const ANSWER_MAX_TOKENS = 512;
const EXCERPT_LENGTH = 500;

@Injectable()
export class ResponseGenerator {
  private readonly logger = new Logger(ResponseGenerator.name);

  constructor(
    private readonly completion: CompletionClient,
    private readonly settings: ConversationSettings,
    private readonly cleaner: AnswerCleaner,
  ) {}

  /**
   * Answers from the documents through the completion backend. Without one, or when it fails,
   * the structured answer is used as-is, else the top document is summarised.
   */
  async generate(
    question: string,
    documents: RetrievedDocument[],
    history: ChatHistory,
    structuredAnswer: string | null,
    guestNotes = '',
  ): Promise<GeneratedAnswer> {
    if (!this.completion.available) {
      return this.fallback(documents, structuredAnswer);
    }

    const reply = await this.completion.generate(
      this.buildPrompt(question, documents, history, guestNotes),
      ANSWER_MAX_TOKENS,
    );
    if (!reply.ok) {
      this.logger.warn(`Answer generation failed (${reply.error.reason}), using template fallback`);
      return this.fallback(documents, structuredAnswer);
    }

    const answer = this.cleaner.clean(reply.value);
    if (!answer) {
      this.logger.warn('Generated answer was empty after cleaning, using template fallback');
      return this.fallback(documents, structuredAnswer);
    }

    return { answer, source: 'completion' };
  }

  stream(
    question: string,
    documents: RetrievedDocument[],
    history: ChatHistory,
    guestNotes = '',
  ): Promise<Result<AsyncIterable<string>, CompletionError>> {
    return this.completion.stream(this.buildPrompt(question, documents, history, guestNotes), ANSWER_MAX_TOKENS);
  }

  clean(text: string): string {
    return this.cleaner.clean(text);
  }

  fallback(documents: RetrievedDocument[], structuredAnswer: string | null): GeneratedAnswer {
    if (structuredAnswer) {
      return { answer: structuredAnswer, source: 'structured' };
    }

    const top = documents[0];
    if (!top) {
      return { answer: "I couldn't find specific information about that in our knowledge base.", source: 'document' };
    }
    return { answer: `Here's what I found:\n\n${this.excerpt(top.content)}`, source: 'document' };
  }

  buildPrompt(question: string, documents: RetrievedDocument[], history: ChatHistory, guestNotes = ''): string {
    this.logger.debug(`Building answer prompt from ${documents.length} documents`);

    const context = documents
      .map((document, index) => `[${index + 1}] ${document.content.trim()}`)
      .join('\n\n');

    return `You are the guest assistant for ${this.settings.propertyName}. Answer the guest's question using only the context below.

Rules:
- Use only facts found in the context. If the context does not answer the question, say so.
- Start with the answer itself. Do not describe your reasoning or refer to "the context".
- If the context contains a DIRECT ANSWER block, repeat it faithfully and do not contradict it.
- Only mention prices when the guest asks about pricing or booking.
- Keep the answer short and friendly. Use a markdown list for several items.

Conversation so far:
${history.toString() || 'None'}
${guestNotes ? `\nWhat we know about the guest:\n${guestNotes}\n` : ''}
Context:
${context || 'None'}

Question: ${question}`;
  }

  /** First sentences of a document, cut near the excerpt length. */
  private excerpt(content: string): string {
    const text = content.trim();
    if (text.length <= EXCERPT_LENGTH) {
      return text;
    }

    const cut = text.slice(0, EXCERPT_LENGTH);
    const lastStop = cut.lastIndexOf('. ');
    return lastStop > EXCERPT_LENGTH / 2 ? cut.slice(0, lastStop + 1) : `${cut.trimEnd()}...`;
  }
}
