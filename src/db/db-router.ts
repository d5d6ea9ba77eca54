import { Logger } from '@nestjs/common';
import { Kysely, MysqlDialect } from 'kysely';
import type { Pool } from 'mysql2';
import type { DB } from './types';

export class DbRouter {
  private readonly logger = new Logger(DbRouter.name);
  private readonly replicas: Kysely<DB>[];
  private currentReplicaIndex = 0;

  constructor(
    private readonly writeDb: Kysely<DB>, // Primary instance (Write)
    readPools: Pool[], // Raw pools for replicas (Read)
  ) {
    this.replicas = readPools.map(
      (pool) => new Kysely<DB>({ dialect: new MysqlDialect({ pool }) }),
    );
  }

  /**
   * Get the write connection (primary).
   */
  write(): Kysely<DB> {
    return this.writeDb;
  }

  /**
   * Get a read connection using round-robin load balancing.
   */
  read(): Kysely<DB> {
    if (this.replicas.length === 0) {
      return this.writeDb; // Fallback to primary if no replicas
    }

    const replica = this.replicas[this.currentReplicaIndex];
    this.currentReplicaIndex =
      (this.currentReplicaIndex + 1) % this.replicas.length;

    return replica;
  }

  /**
   * Executes a read operation with automatic primary fallback.
   */
  async executeRead<T>(operation: (db: Kysely<DB>) => Promise<T>): Promise<T> {
    const replica = this.read();
    if (replica === this.writeDb) return operation(replica);

    try {
      return await operation(replica);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Replica failed, falling back to primary: ${reason}`);
      return await operation(this.writeDb);
    }
  }

  async destroy(): Promise<void> {
    await Promise.all(this.replicas.map((replica) => replica.destroy()));
  }
}
