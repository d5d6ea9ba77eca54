import { Injectable, Logger } from '@nestjs/common';
import { Kysely, Selectable, sql } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { DB, LabelsTable, LocalizedLabelsTable } from '../../db/types';
import { LabelWriteConflictError } from '../../labels/label.errors';
import {
  identifierToString,
  isInterfaceType,
  Label,
  LabelIdentifier,
  LabelUsage,
  LocalizedVariant,
  sameTuple,
  VariantTuple,
} from '../../labels/label.types';
import { LabelCacheService } from '../../labels/store/label-cache.service';
import { LabelStore } from '../../labels/store/label-store.interface';

// -- Database Types --
type LabelRow = Selectable<LabelsTable>;
type VariantRow = Selectable<LocalizedLabelsTable>;

/**
 * MySQL-backed {@link LabelStore}. Label lookups go through the Redis label
 * cache and fall back to the primary; listings and usage read from replicas.
 * Every write goes to the primary and evicts the cache.
 */
@Injectable()
export class KyselyLabelStore implements LabelStore {
  private readonly logger = new Logger(KyselyLabelStore.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly labelCache: LabelCacheService,
  ) {}

  async getLabel(identifier: LabelIdentifier): Promise<Label | null> {
    const cached = await this.readCache(identifier);
    if (cached) return cached;

    // Cache fills read the primary: a lagging replica could hand back a label
    // an edit has already evicted
    const generation = await this.readGeneration(identifier);
    const label = await this.loadLabel(
      this.databaseService.db.write(),
      identifier,
    );
    if (label && generation !== null) await this.writeCache(label, generation);
    return label;
  }

  async upsertIfAbsent(label: Label): Promise<Label> {
    const { namespace, key } = label.identifier;
    const generation = await this.readGeneration(label.identifier);

    // INSERT IGNORE on the (namespace, label_key) unique key: a concurrent
    // creator blocks on the row lock and then inserts nothing.
    const persisted = await this.databaseService.db
      .write()
      .transaction()
      .execute(async (trx) => {
        const result = await trx
          .insertInto('labels')
          .ignore()
          .values({
            namespace,
            label_key: key,
            default_locale: label.defaultLocale,
            default_text: label.defaultText,
          })
          .executeTakeFirst();

        const inserted = (result.numInsertedOrUpdatedRows ?? 0n) > 0n;
        if (inserted && result.insertId !== undefined) {
          const labelId = Number(result.insertId);
          for (const variant of label.variants) {
            await trx
              .insertInto('localized_labels')
              .values(this.toVariantRow(labelId, variant))
              .execute();
          }
          this.logger.log(`Created label ${identifierToString(label.identifier)}`);
        }

        return this.loadLabel(trx, label.identifier);
      });

    if (!persisted) throw new LabelWriteConflictError(label.identifier);

    if (generation !== null) await this.writeCache(persisted, generation);
    return persisted;
  }

  async replaceDefaultText(
    identifier: LabelIdentifier,
    defaultText: string,
  ): Promise<Label | null> {
    const updated = await this.databaseService.db
      .write()
      .transaction()
      .execute(async (trx) => {
        const row = await trx
          .selectFrom('labels')
          .select(['id', 'default_locale'])
          .where('namespace', '=', identifier.namespace)
          .where('label_key', '=', identifier.key)
          .forUpdate()
          .executeTakeFirst();
        if (!row) return null;

        const now = new Date();
        await trx
          .updateTable('labels')
          .set({ default_text: defaultText, updated_at: now })
          .where('id', '=', row.id)
          .execute();

        // Only the unreviewed wording at the bare default-locale tuple follows
        await trx
          .updateTable('localized_labels')
          .set({ alternatives: JSON.stringify([defaultText]), updated_at: now })
          .where('label_id', '=', row.id)
          .where('locale', '=', row.default_locale)
          .where('connector_type', '=', '')
          .where('interface_type', '=', '')
          .where('validated', '=', 0)
          .execute();

        return this.loadLabel(trx, identifier);
      });

    await this.evictCache(identifier);
    return updated;
  }

  async findVariant(
    identifier: LabelIdentifier,
    tuple: VariantTuple,
  ): Promise<LocalizedVariant | null> {
    const label = await this.getLabel(identifier);
    return label?.variants.find((v) => sameTuple(v, tuple)) ?? null;
  }

  async saveVariant(
    identifier: LabelIdentifier,
    variant: LocalizedVariant,
  ): Promise<void> {
    const db = this.databaseService.db.write();
    const labelId = await this.findLabelId(db, identifier);
    if (labelId === null) {
      throw new Error(`Label ${identifierToString(identifier)} not found`);
    }

    const row = this.toVariantRow(labelId, variant);
    await db
      .insertInto('localized_labels')
      .values(row)
      .onDuplicateKeyUpdate({
        alternatives: row.alternatives,
        validated: row.validated,
        updated_at: new Date(),
      })
      .execute();

    await this.evictCache(identifier);
  }

  async listLabels(namespace: string): Promise<Label[]> {
    return this.databaseService.db.executeRead(async (db) => {
      const labels = await db
        .selectFrom('labels')
        .selectAll()
        .where('namespace', '=', namespace)
        .orderBy('label_key', 'asc')
        .execute();
      if (labels.length === 0) return [];

      const variants = await db
        .selectFrom('localized_labels')
        .selectAll()
        .where(
          'label_id',
          'in',
          labels.map((l) => l.id),
        )
        .orderBy('id', 'asc')
        .execute();

      return labels.map((row) =>
        this.mapToLabel(
          row,
          variants.filter((v) => v.label_id === row.id),
        ),
      );
    });
  }

  async recordUsage(
    identifier: LabelIdentifier,
    tuple: VariantTuple,
  ): Promise<void> {
    const db = this.databaseService.db.write();
    const labelId = await this.findLabelId(db, identifier);
    if (labelId === null) return;

    const now = new Date();
    await db
      .insertInto('label_usages')
      .values({
        label_id: labelId,
        locale: tuple.locale,
        connector_type: tuple.connectorType ?? '',
        interface_type: tuple.interfaceType ?? '',
        use_count: 1,
        last_used_at: now,
      })
      .onDuplicateKeyUpdate({
        use_count: sql<number>`use_count + 1`,
        last_used_at: now,
      })
      .execute();
  }

  async findUsage(identifier: LabelIdentifier): Promise<LabelUsage[]> {
    const rows = await this.databaseService.db.executeRead((db) =>
      db
        .selectFrom('label_usages')
        .innerJoin('labels', 'labels.id', 'label_usages.label_id')
        .select([
          'label_usages.locale',
          'label_usages.connector_type',
          'label_usages.interface_type',
          'label_usages.use_count',
          'label_usages.last_used_at',
        ])
        .where('labels.namespace', '=', identifier.namespace)
        .where('labels.label_key', '=', identifier.key)
        .execute(),
    );

    return rows.map((row) => ({
      locale: row.locale,
      connectorType: row.connector_type || undefined,
      interfaceType: isInterfaceType(row.interface_type)
        ? row.interface_type
        : undefined,
      count: Number(row.use_count),
      lastUsedAt: row.last_used_at,
    }));
  }

  async ping(): Promise<void> {
    await this.databaseService.ping();
  }

  // ============================================
  // HELPERS
  // ============================================

  private async loadLabel(
    db: Kysely<DB>,
    identifier: LabelIdentifier,
  ): Promise<Label | null> {
    const row = await db
      .selectFrom('labels')
      .selectAll()
      .where('namespace', '=', identifier.namespace)
      .where('label_key', '=', identifier.key)
      .executeTakeFirst();
    if (!row) return null;

    const variants = await db
      .selectFrom('localized_labels')
      .selectAll()
      .where('label_id', '=', row.id)
      .orderBy('id', 'asc')
      .execute();

    return this.mapToLabel(row, variants);
  }

  private async findLabelId(
    db: Kysely<DB>,
    identifier: LabelIdentifier,
  ): Promise<number | null> {
    const row = await db
      .selectFrom('labels')
      .select('id')
      .where('namespace', '=', identifier.namespace)
      .where('label_key', '=', identifier.key)
      .executeTakeFirst();
    return row ? row.id : null;
  }

  private toVariantRow(labelId: number, variant: LocalizedVariant) {
    return {
      label_id: labelId,
      locale: variant.locale,
      connector_type: variant.connectorType ?? '',
      interface_type: variant.interfaceType ?? '',
      alternatives: JSON.stringify(variant.alternatives),
      validated: variant.validated ? 1 : 0,
    };
  }

  private mapToLabel(row: LabelRow, variants: VariantRow[]): Label {
    return {
      identifier: { namespace: row.namespace, key: row.label_key },
      defaultLocale: row.default_locale,
      defaultText: row.default_text,
      variants: variants.map((v) => this.mapToVariant(v)),
    };
  }

  private mapToVariant(row: VariantRow): LocalizedVariant {
    const alternatives = parseAlternatives(row.alternatives);
    if (alternatives.length === 0) {
      throw new Error(`Localized label ${row.id} has no alternatives`);
    }

    return {
      locale: row.locale,
      connectorType: row.connector_type || undefined,
      interfaceType: isInterfaceType(row.interface_type)
        ? row.interface_type
        : undefined,
      alternatives,
      validated: row.validated === 1,
    };
  }

  // Cache failures degrade to database reads; they never fail a lookup

  private async readCache(identifier: LabelIdentifier): Promise<Label | null> {
    try {
      return await this.labelCache.getLabel(identifier);
    } catch (error) {
      this.logger.warn(`Label cache read failed: ${describeError(error)}`);
      return null;
    }
  }

  private async readGeneration(
    identifier: LabelIdentifier,
  ): Promise<string | null> {
    try {
      return await this.labelCache.generation(identifier);
    } catch (error) {
      this.logger.warn(`Label cache read failed: ${describeError(error)}`);
      return null;
    }
  }

  private async writeCache(label: Label, generation: string): Promise<void> {
    try {
      await this.labelCache.setLabel(label, generation);
    } catch (error) {
      this.logger.warn(`Label cache write failed: ${describeError(error)}`);
    }
  }

  private async evictCache(identifier: LabelIdentifier): Promise<void> {
    try {
      await this.labelCache.invalidate(identifier);
    } catch (error) {
      this.logger.error(
        `Label cache eviction failed for ${identifierToString(identifier)}: ${describeError(error)}`,
      );
    }
  }
}

function parseAlternatives(value: unknown): string[] {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((v): v is string => typeof v === 'string');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
