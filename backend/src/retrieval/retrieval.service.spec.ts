import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { DatabaseService } from '../database/database.service';
import { buildSettings } from '../testing/fixtures';
import { PgVectorRetrievalService } from './retrieval.service';

const mockEmbed = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ embeddings: { create: mockEmbed } })),
}));

describe('PgVectorRetrievalService', () => {
  const settings = buildSettings();

  const build = (database: DatabaseService) =>
    new PgVectorRetrievalService(new ConfigService({}), database, settings);

  const configuredDatabase = () => new DatabaseService(new ConfigService({ DATABASE_URL: 'postgres://test' }));

  it('reports a missing database as an error value', async () => {
    const service = build(new DatabaseService(new ConfigService({})));

    await expect(service.search('is it safe', 3)).resolves.toEqual({
      ok: false,
      error: { reason: 'not_configured', message: 'No knowledge base database is configured' },
    });
  });

  it('falls back to keyword search without an embedding key', async () => {
    const database = configuredDatabase();
    const runQuery = jest.spyOn(database, 'runQuery').mockResolvedValue({
      command: 'SELECT',
      rowCount: 1,
      oid: 0,
      fields: [],
      rows: [{ id: 'doc-1', title: null, content: 'Cottage 9 has a balcony.', metadata: null, similarity: null }],
    });

    const result = await build(database).search('does cottage have balcony', 3, { intent: 'rooms', cottageId: '9' });

    expect(result).toEqual({
      ok: true,
      value: [{ id: 'doc-1', title: null, content: 'Cottage 9 has a balcony.', metadata: {}, similarity: 0.7 }],
    });
    expect(runQuery).toHaveBeenCalledWith(expect.stringContaining("metadata->>'cottage_id' = $2"), [
      'rooms',
      '9',
      '%does%',
      '%cottage%',
      '%have%',
      '%balcony%',
      3,
    ]);
    expect(runQuery).toHaveBeenCalledWith(expect.stringContaining('LIMIT $7'), expect.any(Array));
  });

  it('turns a failed query into an error value', async () => {
    const database = configuredDatabase();
    jest.spyOn(database, 'runQuery').mockRejectedValue(new Error('connection refused'));

    await expect(build(database).search('parking', 3)).resolves.toEqual({
      ok: false,
      error: { reason: 'query_failed', message: 'connection refused' },
    });
  });

  it('tries the embedding once before falling back to keyword search', async () => {
    mockEmbed.mockRejectedValue(new Error('429 Too Many Requests'));
    const database = configuredDatabase();
    jest.spyOn(database, 'runQuery').mockResolvedValue({
      command: 'SELECT',
      rowCount: 0,
      oid: 0,
      fields: [],
      rows: [],
    });
    const service = new PgVectorRetrievalService(
      new ConfigService({ OPENAI_API_KEY: 'test-secret' }),
      database,
      settings,
    );

    await expect(service.search('parking', 3)).resolves.toEqual({ ok: true, value: [] });

    expect(mockEmbed).toHaveBeenCalledTimes(1);
    expect(OpenAI).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      maxRetries: 0,
      timeout: settings.collaboratorTimeoutMs,
    });
  });
});
