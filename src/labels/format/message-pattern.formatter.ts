import { Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LabelEngineError, PatternFormatError } from '../label.errors';
import { DateKind, formatDate, isValidDateStyle } from './date-style';
import { parseChoiceRules } from './message-pattern.parser';
import { compileNumberStyle, formatNumber } from './number-style';
import {
  ArgFormatter,
  ArgValue,
  ChoiceRule,
  CompiledPattern,
  isFormattedArg,
  LabelArg,
  PatternPart,
} from './pattern.types';

/**
 * Renders compiled patterns against positional arguments.
 *
 * Output is all or nothing: any failure raises a {@link PatternFormatError}
 * (or a {@link PatternParseError} for a malformed caller-supplied choice
 * style) instead of a partially rendered string.
 */
@Injectable()
export class MessagePatternFormatter {
  private readonly timeZone: string;

  constructor(@Optional() configService?: ConfigService) {
    this.timeZone = configService?.get<string>('LABEL_TIME_ZONE') ?? 'UTC';
  }

  format(
    pattern: CompiledPattern,
    args: readonly LabelArg[],
    locale: string,
  ): string {
    return pattern.parts
      .map((part) => this.formatPart(part, args, locale))
      .join('');
  }

  private formatPart(
    part: PatternPart,
    args: readonly LabelArg[],
    locale: string,
  ): string {
    if (part.kind === 'text') return part.value;

    if (part.index >= args.length) {
      throw new PatternFormatError(
        `Missing argument {${part.index}}: ${args.length} argument(s) given`,
      );
    }

    const arg = args[part.index];
    const value = isFormattedArg(arg) ? arg.value : arg;
    const formatter: ArgFormatter | undefined = isFormattedArg(arg)
      ? arg.formatter
      : undefined;

    if (formatter?.kind === 'custom') {
      return this.guard(part.index, () => formatter.format(value, locale));
    }

    const override = formatter?.kind === 'style' ? formatter.style : undefined;

    switch (part.kind) {
      case 'simple':
        return this.formatSimple(part.index, value, locale, override);
      case 'number':
        return this.formatNumberPart(
          part.index,
          value,
          locale,
          override ?? part.style,
        );
      case 'date':
      case 'time':
        return this.formatDatePart(
          part.index,
          value,
          locale,
          part.kind,
          override ?? part.style,
        );
      case 'choice': {
        const rules =
          override !== undefined ? parseChoiceRules(override) : part.rules;
        const rule = this.selectRule(part.index, value, rules);
        return this.format(rule.pattern, args, locale);
      }
      default: {
        const exhaustive: never = part;
        throw new PatternFormatError(
          `Unhandled placeholder ${JSON.stringify(exhaustive)}`,
        );
      }
    }
  }

  private formatSimple(
    index: number,
    value: ArgValue,
    locale: string,
    style: string | undefined,
  ): string {
    if (typeof value === 'number') {
      return this.formatNumberPart(index, value, locale, style);
    }
    if (value instanceof Date) {
      return this.formatDatePart(index, value, locale, 'datetime', style);
    }
    return String(value);
  }

  private formatNumberPart(
    index: number,
    value: ArgValue,
    locale: string,
    style: string | undefined,
  ): string {
    if (typeof value !== 'number') {
      throw new PatternFormatError(
        `Argument {${index}} must be a number, got ${describe(value)}`,
      );
    }
    const options = style === undefined ? {} : compileNumberStyle(style);
    if (options === null) {
      throw new PatternFormatError(
        `Invalid number style "${style}" for argument {${index}}`,
      );
    }
    return this.guard(index, () => formatNumber(value, locale, options));
  }

  private formatDatePart(
    index: number,
    value: ArgValue,
    locale: string,
    kind: DateKind,
    style: string | undefined,
  ): string {
    const date =
      typeof value === 'number'
        ? new Date(value)
        : value instanceof Date
          ? value
          : null;

    if (date === null || Number.isNaN(date.getTime())) {
      throw new PatternFormatError(
        `Argument {${index}} must be a valid date, got ${describe(value)}`,
      );
    }
    if (style !== undefined && !isValidDateStyle(style)) {
      throw new PatternFormatError(
        `Invalid date style "${style}" for argument {${index}}`,
      );
    }
    return this.guard(index, () =>
      formatDate(date, locale, kind, style, this.timeZone),
    );
  }

  private selectRule(
    index: number,
    value: ArgValue,
    rules: readonly ChoiceRule[],
  ): ChoiceRule {
    if (typeof value !== 'number') {
      throw new PatternFormatError(
        `Argument {${index}} must be a number for choice, got ${describe(value)}`,
      );
    }

    let selected: ChoiceRule | undefined;
    for (const rule of rules) {
      const matches = rule.inclusive ? value >= rule.bound : value > rule.bound;
      if (!matches) break;
      selected = rule;
    }

    if (!selected) {
      throw new PatternFormatError(
        `No choice rule matches ${value} for argument {${index}}`,
      );
    }
    return selected;
  }

  // Intl raises RangeError for unknown locales, currencies or time zones
  private guard(index: number, render: () => string): string {
    try {
      return render();
    } catch (error) {
      if (error instanceof LabelEngineError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new PatternFormatError(
        `Cannot format argument {${index}}: ${reason}`,
        { cause: error },
      );
    }
  }
}

function describe(value: ArgValue): string {
  if (value instanceof Date) return 'a date';
  return `${typeof value} "${String(value)}"`;
}
