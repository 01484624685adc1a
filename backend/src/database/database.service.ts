import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, QueryResult, QueryResultRow } from 'pg';

const RECOVERABLE_CODES = ['57P01', '57P02', '57P03', '53300', '57P04'];
const QUERY_TIMEOUT_MS = 30000;

const errorCode = (error: unknown): string | undefined =>
  error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly connectionString: string | undefined;
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService) {
    this.connectionString = this.configService.get<string>('DATABASE_URL') || undefined;
    if (!this.connectionString) {
      this.logger.warn('DATABASE_URL is not configured. Document retrieval is disabled.');
    }
  }

  get isConfigured(): boolean {
    return this.connectionString !== undefined;
  }

  async runQuery<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Database query timeout after ${QUERY_TIMEOUT_MS / 1000} seconds`));
      }, QUERY_TIMEOUT_MS);
    });

    try {
      return await Promise.race([this.getPool().query<T>(text, params), timeout]);
    } catch (error) {
      this.logger.error(`Database query failed or timed out: ${errorMessage(error)}`);
      if (this.isRecoverableError(error)) {
        // Single attempt; the next query starts on a fresh pool.
        await this.resetPool();
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.resetPool();
  }

  private getPool(): Pool {
    if (!this.connectionString) {
      throw new Error('DATABASE_URL is not configured');
    }

    if (!this.pool) {
      const pool = new Pool({
        connectionString: this.connectionString,
        max: 10,
        idleTimeoutMillis: 10000,
        connectionTimeoutMillis: 5000,
        allowExitOnIdle: true,
      });

      // A broken pool is replaced on the next query.
      pool.on('error', (error) => {
        this.logger.warn(`Database pool error, recreating on next query: ${error.message}`);
        if (this.pool === pool) {
          this.pool = null;
        }
      });

      this.pool = pool;
    }

    return this.pool;
  }

  private isRecoverableError(error: unknown): boolean {
    const code = errorCode(error);
    if (code && RECOVERABLE_CODES.includes(code)) {
      return true;
    }

    const message = errorMessage(error).toLowerCase();
    return message.includes('shutdown') || message.includes('termination');
  }

  private async resetPool(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (!pool) {
      return;
    }

    try {
      await pool.end();
    } catch (error) {
      this.logger.debug(`Pool shutdown warning: ${errorMessage(error)}`);
    }
  }
}
