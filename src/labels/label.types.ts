// Domain interfaces for labels and their localized variants

export type InterfaceType = 'text' | 'voice';

export const INTERFACE_TYPES: readonly InterfaceType[] = ['text', 'voice'];

export interface LabelIdentifier {
  namespace: string;
  key: string;
}

/**
 * Scoping of a variant. An absent connector or interface type means the
 * variant applies to every channel or modality of its locale.
 */
export interface VariantTuple {
  locale: string;
  connectorType?: string;
  interfaceType?: InterfaceType;
}

export interface LocalizedVariant extends VariantTuple {
  alternatives: string[];
  validated: boolean;
}

export interface Label {
  identifier: LabelIdentifier;
  defaultLocale: string;
  defaultText: string;
  variants: LocalizedVariant[];
}

export type RenderContext = VariantTuple;

export interface ResolvedPattern {
  pattern: string;
  // null when no variant matched and the label's default text was used
  variant: LocalizedVariant | null;
  freshlyCreated: boolean;
  validated: boolean;
}

export interface LabelUsage extends VariantTuple {
  count: number;
  lastUsedAt: Date;
}

// `namespace:key`, for log and error messages
export function identifierToString(identifier: LabelIdentifier): string {
  return `${identifier.namespace}:${identifier.key}`;
}

// Namespaces and explicit keys may both contain ':'
export function identityKey(identifier: LabelIdentifier): string {
  return JSON.stringify([identifier.namespace, identifier.key]);
}

export function tupleToString(tuple: VariantTuple): string {
  return JSON.stringify([
    tuple.locale,
    tuple.connectorType ?? null,
    tuple.interfaceType ?? null,
  ]);
}

export function sameTuple(a: VariantTuple, b: VariantTuple): boolean {
  return (
    a.locale === b.locale &&
    a.connectorType === b.connectorType &&
    a.interfaceType === b.interfaceType
  );
}

export function isInterfaceType(value: unknown): value is InterfaceType {
  return value === 'text' || value === 'voice';
}
