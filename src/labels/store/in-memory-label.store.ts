import { Injectable, Logger } from '@nestjs/common';
import {
  identifierToString,
  identityKey,
  Label,
  LabelIdentifier,
  LabelUsage,
  LocalizedVariant,
  sameTuple,
  tupleToString,
  VariantTuple,
} from '../label.types';
import { LabelStore } from './label-store.interface';

function copyVariant(variant: LocalizedVariant): LocalizedVariant {
  return { ...variant, alternatives: [...variant.alternatives] };
}

function copyLabel(label: Label): Label {
  return {
    identifier: { ...label.identifier },
    defaultLocale: label.defaultLocale,
    defaultText: label.defaultText,
    variants: label.variants.map(copyVariant),
  };
}

/**
 * Process-local store used by the `memory` driver and as the test double.
 * Every method body runs without awaiting before it mutates, so a check
 * and the write that follows it cannot interleave with another call.
 */
@Injectable()
export class InMemoryLabelStore implements LabelStore {
  private readonly logger = new Logger(InMemoryLabelStore.name);
  private readonly labels = new Map<string, Label>();
  private readonly usages = new Map<string, Map<string, LabelUsage>>();

  async getLabel(identifier: LabelIdentifier): Promise<Label | null> {
    const label = this.labels.get(identityKey(identifier));
    return label ? copyLabel(label) : null;
  }

  async upsertIfAbsent(label: Label): Promise<Label> {
    const id = identityKey(label.identifier);
    const existing = this.labels.get(id);
    if (existing) return copyLabel(existing);

    this.labels.set(id, copyLabel(label));
    this.logger.debug(`Created label ${identifierToString(label.identifier)}`);
    return copyLabel(label);
  }

  async replaceDefaultText(
    identifier: LabelIdentifier,
    defaultText: string,
  ): Promise<Label | null> {
    const label = this.labels.get(identityKey(identifier));
    if (!label) return null;

    label.defaultText = defaultText;
    const bare: VariantTuple = { locale: label.defaultLocale };
    label.variants = label.variants.map((v) =>
      sameTuple(v, bare) && !v.validated
        ? { ...v, alternatives: [defaultText] }
        : v,
    );
    return copyLabel(label);
  }

  async findVariant(
    identifier: LabelIdentifier,
    tuple: VariantTuple,
  ): Promise<LocalizedVariant | null> {
    const label = this.labels.get(identityKey(identifier));
    const variant = label?.variants.find((v) => sameTuple(v, tuple));
    return variant ? copyVariant(variant) : null;
  }

  async saveVariant(
    identifier: LabelIdentifier,
    variant: LocalizedVariant,
  ): Promise<void> {
    const label = this.labels.get(identityKey(identifier));
    if (!label) {
      throw new Error(`Label ${identifierToString(identifier)} not found`);
    }

    const rest = label.variants.filter((v) => !sameTuple(v, variant));
    label.variants = [...rest, copyVariant(variant)];
  }

  async listLabels(namespace: string): Promise<Label[]> {
    return [...this.labels.values()]
      .filter((label) => label.identifier.namespace === namespace)
      .sort((a, b) => a.identifier.key.localeCompare(b.identifier.key))
      .map(copyLabel);
  }

  async recordUsage(
    identifier: LabelIdentifier,
    tuple: VariantTuple,
  ): Promise<void> {
    const id = identityKey(identifier);
    let byTuple = this.usages.get(id);
    if (!byTuple) {
      byTuple = new Map();
      this.usages.set(id, byTuple);
    }

    const tupleKey = tupleToString(tuple);
    const usage = byTuple.get(tupleKey);
    if (usage) {
      usage.count++;
      usage.lastUsedAt = new Date();
    } else {
      byTuple.set(tupleKey, { ...tuple, count: 1, lastUsedAt: new Date() });
    }
  }

  async findUsage(identifier: LabelIdentifier): Promise<LabelUsage[]> {
    const byTuple = this.usages.get(identityKey(identifier));
    return byTuple ? [...byTuple.values()].map((u) => ({ ...u })) : [];
  }

  async ping(): Promise<void> {}
}
