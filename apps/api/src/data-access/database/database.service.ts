import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { Pool, PoolClient, QueryResultRow } from 'pg';
import { APP_CONFIG, AppConfig } from '../../config/app.config';

/** A client checked out of the pool with an open transaction. */
export type TransactionClient = PoolClient;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly pool: Pool;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.pool = new Pool({
      connectionString: config.databaseUrl,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
    this.pool.on('error', (err) => {
      this.logger.error('Idle database client failed', err.stack);
    });
  }

  async query<R extends QueryResultRow>(
    text: string,
    values: unknown[] = [],
    tx?: TransactionClient,
  ): Promise<R[]> {
    const result = tx
      ? await tx.query<R>(text, values)
      : await this.pool.query<R>(text, values);
    return result.rows;
  }

  async transaction<T>(
    work: (tx: TransactionClient) => Promise<T>,
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}
