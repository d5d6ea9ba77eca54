export type ArgValue = string | number | boolean | Date;

/**
 * Per-call presentation attached to an argument. A `style` replaces the
 * placeholder's own style; a `custom` formatter replaces the placeholder's
 * formatting altogether.
 */
export type ArgFormatter =
  | { kind: 'style'; style: string }
  | { kind: 'custom'; format: (value: ArgValue, locale: string) => string };

export interface FormattedArg {
  value: ArgValue;
  formatter: ArgFormatter;
}

export type LabelArg = ArgValue | FormattedArg;

export function isFormattedArg(arg: LabelArg): arg is FormattedArg {
  return typeof arg === 'object' && !(arg instanceof Date);
}

export function withStyle(value: ArgValue, style: string): FormattedArg {
  return { value, formatter: { kind: 'style', style } };
}

export function withFormatter(
  value: ArgValue,
  format: (value: ArgValue, locale: string) => string,
): FormattedArg {
  return { value, formatter: { kind: 'custom', format } };
}

// -- Compiled form --

export type FormatType = 'number' | 'date' | 'time' | 'choice';

export const FORMAT_TYPES: readonly FormatType[] = [
  'number',
  'date',
  'time',
  'choice',
];

export interface ChoiceRule {
  bound: number;
  // true for `#`: value >= bound; false for `<`: value > bound
  inclusive: boolean;
  pattern: CompiledPattern;
}

export type PatternPart =
  | { kind: 'text'; value: string }
  | { kind: 'simple'; index: number }
  | { kind: 'number'; index: number; style?: string }
  | { kind: 'date'; index: number; style?: string }
  | { kind: 'time'; index: number; style?: string }
  | { kind: 'choice'; index: number; style: string; rules: ChoiceRule[] };

export interface CompiledPattern {
  readonly source: string;
  readonly parts: readonly PatternPart[];
  // highest argument index referenced, -1 when none
  readonly maxIndex: number;
}
