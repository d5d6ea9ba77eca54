import {
  Label,
  LabelIdentifier,
  LabelUsage,
  LocalizedVariant,
  VariantTuple,
} from '../label.types';

export const LABEL_STORE = 'LABEL_STORE';

/**
 * Persistence contract for labels. Implementations own label lifetime and
 * return fresh copies: callers never hold a reference into store state.
 */
export interface LabelStore {
  getLabel(identifier: LabelIdentifier): Promise<Label | null>;

  /**
   * Creates `label` unless one already exists for its identifier, and returns
   * whichever is persisted. Concurrent calls for one identifier persist a
   * single row. May raise `LabelWriteConflictError` when the race is lost in
   * a way the store cannot settle itself.
   */
  upsertIfAbsent(label: Label): Promise<Label>;

  /**
   * Makes `defaultText` the label's default text. An unvalidated variant at
   * the bare default-locale tuple takes it as its only alternative; validated
   * variants are kept. Returns null when the label does not exist.
   */
  replaceDefaultText(
    identifier: LabelIdentifier,
    defaultText: string,
  ): Promise<Label | null>;

  findVariant(
    identifier: LabelIdentifier,
    tuple: VariantTuple,
  ): Promise<LocalizedVariant | null>;

  /** Replaces the variant at `variant`'s exact tuple, or adds it. */
  saveVariant(
    identifier: LabelIdentifier,
    variant: LocalizedVariant,
  ): Promise<void>;

  listLabels(namespace: string): Promise<Label[]>;

  recordUsage(identifier: LabelIdentifier, tuple: VariantTuple): Promise<void>;

  findUsage(identifier: LabelIdentifier): Promise<LabelUsage[]>;

  /** Connectivity check used by the health endpoint. */
  ping(): Promise<void>;
}
