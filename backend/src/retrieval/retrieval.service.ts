import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { err, ok, Result, settle } from '../common/result';
import { ConversationSettings } from '../config/conversation-settings.service';
import { DatabaseService } from '../database/database.service';
import { RetrievalFilter } from './query-optimizer';
import { RetrievedDocument } from './retrieved-document';

export type RetrievalErrorReason = 'not_configured' | 'query_failed';

export interface RetrievalError {
  reason: RetrievalErrorReason;
  message: string;
}

const retrievalFailure = (cause: unknown): RetrievalError => ({
  reason: 'query_failed',
  message: cause instanceof Error ? cause.message : String(cause),
});

/** Knowledge base lookup. Failures are values so a turn can still answer without documents. */
export abstract class RetrievalService {
  abstract search(
    query: string,
    limit: number,
    filter?: RetrievalFilter,
  ): Promise<Result<RetrievedDocument[], RetrievalError>>;
}

interface DocumentRow {
  id: string;
  title: string | null;
  content: string;
  metadata: Record<string, unknown> | null;
  similarity: number | null;
}

const KEYWORD_SIMILARITY = 0.7;
const RECENT_SIMILARITY = 0.5;
const MAX_KEYWORDS = 5;

const toDocument = (row: DocumentRow, fallbackSimilarity: number): RetrievedDocument => ({
  id: row.id,
  title: row.title,
  content: row.content,
  metadata: row.metadata ?? {},
  similarity: row.similarity ?? fallbackSimilarity,
});

/** pgvector similarity over knowledge_base_documents, with an ILIKE fallback. */
@Injectable()
export class PgVectorRetrievalService extends RetrievalService {
  private readonly logger = new Logger(PgVectorRetrievalService.name);
  private readonly openai: OpenAI | null;
  private readonly embeddingModel = 'text-embedding-3-small';

  constructor(
    private readonly configService: ConfigService,
    private readonly databaseService: DatabaseService,
    private readonly settings: ConversationSettings,
  ) {
    super();
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      this.logger.warn('OPENAI_API_KEY is not configured. Retrieval uses keyword search only.');
      this.openai = null;
    } else {
      this.openai = new OpenAI({ apiKey, maxRetries: 0, timeout: this.settings.collaboratorTimeoutMs });
    }
  }

  async search(
    query: string,
    limit: number,
    filter?: RetrievalFilter,
  ): Promise<Result<RetrievedDocument[], RetrievalError>> {
    if (!this.databaseService.isConfigured) {
      return err({ reason: 'not_configured', message: 'No knowledge base database is configured' });
    }

    if (this.openai) {
      const vector = await settle(
        this.searchByEmbedding(this.openai, query, limit, filter),
        this.settings.collaboratorTimeoutMs,
        retrievalFailure,
      );
      if (vector.ok) {
        return vector;
      }
      this.logger.error(`Vector search failed, falling back to keyword search: ${vector.error.message}`);
    }

    return settle(
      this.searchByKeyword(query, limit, filter),
      this.settings.collaboratorTimeoutMs,
      retrievalFailure,
    );
  }

  private async searchByEmbedding(
    openai: OpenAI,
    query: string,
    limit: number,
    filter?: RetrievalFilter,
  ): Promise<RetrievedDocument[]> {
    const response = await openai.embeddings.create({ model: this.embeddingModel, input: query });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error('Embedding response was empty');
    }

    const params: unknown[] = [`[${embedding.join(',')}]`];
    const conditions = ['embedding IS NOT NULL', ...this.filterConditions(filter, params)];
    params.push(limit);

    const result = await this.databaseService.runQuery<DocumentRow>(
      `SELECT id, title, content, metadata,
          1 - (embedding <=> $1::extensions.vector) AS similarity
       FROM public.knowledge_base_documents
       WHERE ${conditions.join(' AND ')}
       ORDER BY embedding <=> $1::extensions.vector
       LIMIT $${params.length}`,
      params,
    );

    return result.rows.map((row) => toDocument(row, 0));
  }

  private async searchByKeyword(
    query: string,
    limit: number,
    filter?: RetrievalFilter,
  ): Promise<RetrievedDocument[]> {
    const keywords = query
      .toLowerCase()
      .split(/\s+/)
      .filter((word) => word.length > 3)
      .slice(0, MAX_KEYWORDS);

    const params: unknown[] = [];
    const conditions = this.filterConditions(filter, params);
    if (keywords.length > 0) {
      const matches = keywords.map((keyword) => {
        params.push(`%${keyword}%`);
        return `content ILIKE $${params.length}`;
      });
      conditions.push(`(${matches.join(' OR ')})`);
    }
    params.push(limit);

    const result = await this.databaseService.runQuery<DocumentRow>(
      `SELECT id, title, content, metadata, NULL::float AS similarity
       FROM public.knowledge_base_documents
       ${conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''}
       ORDER BY updated_at DESC
       LIMIT $${params.length}`,
      params,
    );

    const similarity = keywords.length > 0 ? KEYWORD_SIMILARITY : RECENT_SIMILARITY;
    return result.rows.map((row) => toDocument(row, similarity));
  }

  // Untagged documents always pass the metadata filter.
  private filterConditions(filter: RetrievalFilter | undefined, params: unknown[]): string[] {
    if (!filter) {
      return [];
    }

    params.push(filter.intent);
    const conditions = [`(metadata->>'intent' IS NULL OR metadata->>'intent' = $${params.length})`];
    if (filter.cottageId) {
      params.push(filter.cottageId);
      conditions.push(`(metadata->>'cottage_id' IS NULL OR metadata->>'cottage_id' = $${params.length})`);
    }
    return conditions;
  }
}
