import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kysely, MysqlDialect, sql } from 'kysely';
import { createPool, Pool, PoolOptions } from 'mysql2';
import { DbRouter } from './db-router';
import type { DB } from './types';

/**
 * Parses `DATABASE_REPLICA_HOSTS`, a comma separated list of `host[:port]`.
 */
export function parseReplicaHosts(
  value: string | undefined,
): Array<{ host: string; port: number }> {
  if (!value) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const [host, port] = entry.split(':');
      return { host, port: port ? parseInt(port, 10) : 3306 };
    });
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  // The main entry point for repositories
  public readonly db: DbRouter;

  // Internal connection pools (stored for cleanup)
  private readonly primaryPool: Pool;
  private readonly replicaPools: Pool[];

  private readonly writeDb: Kysely<DB>;

  constructor(configService: ConfigService) {
    const commonConfig: PoolOptions = {
      user: configService.get<string>('DATABASE_USER', 'root'),
      password: configService.get<string>('DATABASE_PASSWORD', ''),
      database: configService.get<string>('DATABASE_NAME', 'labels_db'),
      connectionLimit: parseInt(
        configService.get<string>('DB_CONNECTION_LIMIT', '10'),
        10,
      ),
      timezone: 'Z',
    };

    this.primaryPool = createPool({
      ...commonConfig,
      host: configService.get<string>('DATABASE_HOST', 'localhost'),
      port: parseInt(configService.get<string>('DATABASE_PORT', '3306'), 10),
    });

    this.replicaPools = parseReplicaHosts(
      configService.get<string>('DATABASE_REPLICA_HOSTS'),
    ).map((replica) => createPool({ ...commonConfig, ...replica }));

    this.writeDb = new Kysely<DB>({
      dialect: new MysqlDialect({ pool: this.primaryPool }),
      log: ['error'],
    });

    this.db = new DbRouter(this.writeDb, this.replicaPools);
  }

  async onModuleInit() {
    try {
      await this.ping();
      this.logger.log(
        `Database initialized. Replicas connected: ${this.replicaPools.length}`,
      );
    } catch (error) {
      this.logger.error('Failed to connect to database', error);
      throw error;
    }
  }

  async ping(): Promise<void> {
    await sql`select 1`.execute(this.writeDb);
  }

  async onModuleDestroy() {
    // Kysely's destroy ends the pools it wraps
    await Promise.all([this.writeDb.destroy(), this.db.destroy()]);
    this.logger.log('Database connections closed');
  }
}
