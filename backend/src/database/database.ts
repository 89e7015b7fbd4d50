import { Pool, QueryResult, QueryResultRow } from 'pg';
import { SCHEMA_SQL } from './schema';
import { log } from '../utils/logger';

/**
 * The slice of Database that repositories depend on
 */
export interface Queryable {
  run(sql: string, params?: unknown[]): Promise<QueryResult>;
  get(sql: string, params?: unknown[]): Promise<QueryResultRow | undefined>;
}

export class Database implements Queryable {
  private pool: Pool;
  private static instance: Database | null = null;

  private constructor(connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', (err) => {
      log.error('Unexpected error on idle PostgreSQL client', 'Database', err);
    });
  }

  public static getInstance(connectionString: string | undefined = process.env.DATABASE_URL): Database {
    if (!Database.instance) {
      if (!connectionString) {
        throw new Error('DATABASE_URL environment variable is required for PostgreSQL connection');
      }
      Database.instance = new Database(connectionString);
    }
    return Database.instance;
  }

  public async initialize(): Promise<void> {
    try {
      await this.pool.query(SCHEMA_SQL);
      log.info('Database schema initialized successfully', 'Database');
    } catch (error) {
      log.error('Error initializing database schema', 'Database', error);
      throw error;
    }
  }

  // Run a query (INSERT, UPDATE, DELETE)
  public async run(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.pool.query(sql, params);
  }

  // Get a single row
  public async get(sql: string, params: unknown[] = []): Promise<QueryResultRow | undefined> {
    const result = await this.pool.query(sql, params);
    return result.rows[0];
  }

  public async close(): Promise<void> {
    await this.pool.end();
    Database.instance = null;
    log.info('Database connection pool closed', 'Database');
  }
}

export default Database;
