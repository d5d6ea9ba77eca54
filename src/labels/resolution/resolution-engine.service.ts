import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  KeyCollisionWarning,
  LabelEngineError,
  LabelWriteConflictError,
  StoreUnavailableError,
} from '../label.errors';
import {
  identifierToString,
  identityKey,
  Label,
  LabelIdentifier,
  LocalizedVariant,
  RenderContext,
  ResolvedPattern,
  sameTuple,
  tupleToString,
  VariantTuple,
} from '../label.types';
import { LABEL_STORE, LabelStore } from '../store/label-store.interface';
import { RANDOM_SOURCE, RandomSource } from './random-source';

const MAX_REPORTED_COLLISIONS = 1000;

/**
 * Tuples to try for one locale, most specific first:
 * (connector, interface), (connector, -), (-, interface), (-, -).
 */
export function candidateTuples(tuple: VariantTuple): VariantTuple[] {
  const { locale, connectorType, interfaceType } = tuple;
  const all: VariantTuple[] = [
    { locale, connectorType, interfaceType },
    { locale, connectorType },
    { locale, interfaceType },
    { locale },
  ];

  const seen = new Set<string>();
  return all.filter((candidate) => {
    const key = tupleToString(candidate);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

@Injectable()
export class ResolutionEngine {
  private readonly logger = new Logger(ResolutionEngine.name);
  private readonly pendingCreations = new Map<string, Promise<Label>>();
  private readonly reportedCollisions = new Set<string>();

  constructor(
    @Inject(LABEL_STORE) private readonly store: LabelStore,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  async resolve(
    identifier: LabelIdentifier,
    defaultText: string,
    context: RenderContext,
  ): Promise<ResolvedPattern> {
    const existing = await this.callStore(() => this.store.getLabel(identifier));

    let label: Label;
    if (existing) {
      label =
        existing.defaultText === defaultText
          ? existing
          : await this.takeOverDefaultText(existing, defaultText);
    } else {
      label = await this.createOnce(identifier, defaultText, context.locale);
    }

    const variant = this.selectVariant(label, context);
    if (!variant) {
      return {
        pattern: label.defaultText,
        variant: null,
        freshlyCreated: existing === null,
        validated: false,
      };
    }

    return {
      pattern: this.pickAlternative(variant),
      variant,
      freshlyCreated: existing === null,
      validated: variant.validated,
    };
  }

  /**
   * First variant matching the requested locale, then the label's default
   * locale, by decreasing specificity.
   */
  selectVariant(label: Label, context: RenderContext): LocalizedVariant | null {
    const locales =
      label.defaultLocale === context.locale
        ? [context.locale]
        : [context.locale, label.defaultLocale];

    for (const locale of locales) {
      for (const candidate of candidateTuples({ ...context, locale })) {
        const variant = label.variants.find(
          (v) => sameTuple(v, candidate) && v.alternatives.length > 0,
        );
        if (variant) return variant;
      }
    }
    return null;
  }

  private pickAlternative(variant: LocalizedVariant): string {
    const count = variant.alternatives.length;
    if (count === 1) return variant.alternatives[0];

    const index = this.random.nextInt(count);
    return variant.alternatives[Math.min(Math.max(0, index), count - 1)];
  }

  // One creation in flight per identifier; concurrent misses share it
  private createOnce(
    identifier: LabelIdentifier,
    defaultText: string,
    locale: string,
  ): Promise<Label> {
    const id = identityKey(identifier);
    const pending = this.pendingCreations.get(id);
    if (pending) return pending;

    const creation = this.create(identifier, defaultText, locale).finally(() =>
      this.pendingCreations.delete(id),
    );
    this.pendingCreations.set(id, creation);
    return creation;
  }

  private async create(
    identifier: LabelIdentifier,
    defaultText: string,
    locale: string,
  ): Promise<Label> {
    const label: Label = {
      identifier,
      defaultLocale: locale,
      defaultText,
      variants: [{ locale, alternatives: [defaultText], validated: false }],
    };

    try {
      return await this.store.upsertIfAbsent(label);
    } catch (error) {
      if (!(error instanceof LabelWriteConflictError)) {
        throw this.unavailable(error);
      }

      this.logger.warn(
        `Write conflict creating ${identifierToString(identifier)}, reading the winner`,
      );
      const winner = await this.callStore(() => this.store.getLabel(identifier));
      if (winner) return winner;

      throw new StoreUnavailableError(
        `Label ${identifierToString(identifier)} could not be created`,
        { cause: error },
      );
    }
  }

  // Key collision: the last caller's default text wins
  private async takeOverDefaultText(
    existing: Label,
    requestedText: string,
  ): Promise<Label> {
    this.reportCollision(existing, requestedText);
    const updated = await this.callStore(() =>
      this.store.replaceDefaultText(existing.identifier, requestedText),
    );
    return updated ?? existing;
  }

  private reportCollision(label: Label, requestedText: string): void {
    const { namespace, key } = label.identifier;
    const reportKey = JSON.stringify([namespace, key, requestedText]);
    if (this.reportedCollisions.has(reportKey)) return;

    if (this.reportedCollisions.size >= MAX_REPORTED_COLLISIONS) {
      this.reportedCollisions.clear();
    }
    this.reportedCollisions.add(reportKey);

    const warning = new KeyCollisionWarning(
      label.identifier,
      label.defaultText,
      requestedText,
    );
    this.logger.warn(warning.toString());
  }

  private async callStore<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.unavailable(error);
    }
  }

  private unavailable(error: unknown): LabelEngineError {
    if (error instanceof LabelEngineError) return error;
    const reason = error instanceof Error ? error.message : String(error);
    return new StoreUnavailableError(`Label store failed: ${reason}`, {
      cause: error,
    });
  }
}
