import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { PatternCacheService } from './format/pattern-cache.service';
import {
  identifierToString,
  Label,
  LabelIdentifier,
  LabelUsage,
  LocalizedVariant,
  sameTuple,
  tupleToString,
} from './label.types';
import { LABEL_STORE, LabelStore } from './store/label-store.interface';

// Import/export records share the aggregate's shape
export type LabelRecord = Label;

// Checked for every record before the first write, so a bad file imports nothing
function rejectDuplicateTuples(record: LabelRecord): void {
  const seen = new Set<string>();
  for (const variant of record.variants) {
    const tuple = tupleToString(variant);
    if (seen.has(tuple)) {
      const context = [variant.locale, variant.connectorType, variant.interfaceType]
        .filter((part) => part !== undefined)
        .join('/');
      throw new BadRequestException(
        `Label ${identifierToString(record.identifier)} has more than one variant for ${context}`,
      );
    }
    seen.add(tuple);
  }
}

export interface ImportSummary {
  created: number;
  updated: number;
  added: number;
  skipped: number;
}

@Injectable()
export class LabelsService {
  private readonly logger = new Logger(LabelsService.name);

  constructor(
    @Inject(LABEL_STORE) private readonly store: LabelStore,
    private readonly patternCache: PatternCacheService,
  ) {}

  async findLabel(identifier: LabelIdentifier): Promise<Label> {
    const label = await this.store.getLabel(identifier);
    if (!label) {
      throw new NotFoundException(
        `Label ${identifierToString(identifier)} not found`,
      );
    }
    return label;
  }

  async listLabels(namespace: string): Promise<Label[]> {
    return this.store.listLabels(namespace);
  }

  /**
   * Administrative edit of one variant. Compiled patterns of the edited tuple
   * are evicted so the next render parses the new text.
   */
  async saveVariant(
    identifier: LabelIdentifier,
    variant: LocalizedVariant,
  ): Promise<Label> {
    if (variant.alternatives.length === 0) {
      throw new BadRequestException('A variant needs at least one alternative');
    }

    await this.findLabel(identifier);
    await this.store.saveVariant(identifier, variant);
    this.patternCache.invalidate(identifier, variant);

    return this.findLabel(identifier);
  }

  async findUsage(identifier: LabelIdentifier): Promise<LabelUsage[]> {
    await this.findLabel(identifier);
    return this.store.findUsage(identifier);
  }

  /**
   * Merges records into the store. Unknown labels are created as given.
   * For known labels, validated variants overwrite the variant at their
   * tuple; unvalidated ones are only added where no variant exists yet.
   */
  async importLabels(records: LabelRecord[]): Promise<ImportSummary> {
    const summary: ImportSummary = {
      created: 0,
      updated: 0,
      added: 0,
      skipped: 0,
    };

    records.forEach(rejectDuplicateTuples);

    for (const record of records) {
      const existing = await this.store.getLabel(record.identifier);

      if (!existing) {
        await this.store.upsertIfAbsent(record);
        this.patternCache.invalidate(record.identifier);
        summary.created++;
        continue;
      }

      for (const variant of record.variants) {
        const current = existing.variants.find((v) => sameTuple(v, variant));

        if (current && !variant.validated) {
          summary.skipped++;
          continue;
        }

        await this.store.saveVariant(record.identifier, variant);
        this.patternCache.invalidate(record.identifier, variant);
        if (current) summary.updated++;
        else summary.added++;
      }
    }

    this.logger.log(
      `Imported ${records.length} label(s): ${summary.created} created, ` +
        `${summary.updated} updated, ${summary.added} added, ${summary.skipped} skipped`,
    );
    return summary;
  }

  async exportLabels(namespace: string): Promise<LabelRecord[]> {
    return this.store.listLabels(namespace);
  }
}
