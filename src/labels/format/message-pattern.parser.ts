import { PatternParseError } from '../label.errors';
import { isValidDateStyle } from './date-style';
import { compileNumberStyle } from './number-style';
import {
  ChoiceRule,
  CompiledPattern,
  FORMAT_TYPES,
  FormatType,
  PatternPart,
} from './pattern.types';

export const QUOTABLE = new Set(['{', '}', '|', '#', "'"]);

/**
 * Parses a message pattern such as
 * `{0,choice,0#no files|1#one file|1<{0} files}` into an immutable
 * {@link CompiledPattern}.
 *
 * An apostrophe only quotes when it is followed by one of `{ } | # '`, so
 * ordinary text like "don't" passes through untouched.
 */
export function parsePattern(pattern: string): CompiledPattern {
  const compiled = new PatternParser(pattern).parseSegment(0, pattern.length);
  return deepFreeze(compiled);
}

/**
 * Parses a choice style on its own, used when a caller supplies the rules as
 * an argument style instead of the stored pattern.
 */
export function parseChoiceRules(style: string): ChoiceRule[] {
  return deepFreeze(new PatternParser(style).parseChoice(0, style.length));
}

export function isFormatType(value: string): value is FormatType {
  return FORMAT_TYPES.some((type) => type === value);
}

class PatternParser {
  constructor(private readonly src: string) {}

  parseSegment(start: number, end: number): CompiledPattern {
    const parts: PatternPart[] = [];
    let text = '';
    let i = start;

    while (i < end) {
      const ch = this.src[i];

      if (ch === "'") {
        const quoted = this.readQuoted(i, end);
        text += quoted.text;
        i = quoted.next;
        continue;
      }

      if (ch === '{') {
        const close = this.findClosingBrace(i, end);
        if (text) {
          parts.push({ kind: 'text', value: text });
          text = '';
        }
        parts.push(this.parsePlaceholder(i + 1, close));
        i = close + 1;
        continue;
      }

      if (ch === '}') {
        throw this.error(i, 'Unmatched closing brace');
      }

      text += ch;
      i++;
    }

    if (text) parts.push({ kind: 'text', value: text });

    return {
      source: this.src.slice(start, end),
      parts,
      maxIndex: maxIndexOf(parts),
    };
  }

  parseChoice(start: number, end: number): ChoiceRule[] {
    const rules: ChoiceRule[] = [];

    for (const [segStart, segEnd] of this.splitChoice(start, end)) {
      const separator = this.findChoiceSeparator(segStart, segEnd);
      const boundText = this.src.slice(segStart, separator).trim();
      const bound = parseBound(boundText);
      if (bound === null) {
        throw this.error(segStart, `Invalid choice bound "${boundText}"`);
      }

      const inclusive = this.src[separator] !== '<';
      const previous = rules[rules.length - 1];
      if (
        previous &&
        (bound < previous.bound ||
          (bound === previous.bound && (inclusive || !previous.inclusive)))
      ) {
        throw this.error(segStart, 'Choice bounds must be ascending');
      }

      rules.push({
        bound,
        inclusive,
        pattern: this.parseSegment(separator + 1, segEnd),
      });
    }

    return rules;
  }

  private parsePlaceholder(start: number, end: number): PatternPart {
    const firstComma = this.src.indexOf(',', start);
    const indexEnd = firstComma === -1 || firstComma > end ? end : firstComma;
    const indexText = this.src.slice(start, indexEnd).trim();

    if (!/^\d+$/.test(indexText)) {
      throw this.error(start, `Invalid argument index "${indexText}"`);
    }
    const index = parseInt(indexText, 10);

    if (indexEnd === end) return { kind: 'simple', index };

    const typeStart = indexEnd + 1;
    const secondComma = this.src.indexOf(',', typeStart);
    const typeEnd = secondComma === -1 || secondComma > end ? end : secondComma;
    const typeText = this.src.slice(typeStart, typeEnd).trim();

    if (!isFormatType(typeText)) {
      throw this.error(typeStart, `Unknown format type "${typeText}"`);
    }

    const styleStart = typeEnd === end ? end : typeEnd + 1;
    const rawStyle = this.src.slice(styleStart, end);
    const style = rawStyle.trim() || undefined;

    switch (typeText) {
      case 'number':
        if (style !== undefined && compileNumberStyle(style) === null) {
          throw this.error(styleStart, `Invalid number style "${style}"`);
        }
        return { kind: 'number', index, style };
      case 'date':
      case 'time':
        if (style !== undefined && !isValidDateStyle(style)) {
          throw this.error(styleStart, `Invalid ${typeText} style "${style}"`);
        }
        return { kind: typeText, index, style };
      case 'choice':
        if (style === undefined) {
          throw this.error(styleStart, 'Choice format requires rules');
        }
        return {
          kind: 'choice',
          index,
          style: rawStyle,
          rules: this.parseChoice(styleStart, end),
        };
      default: {
        const exhaustive: never = typeText;
        throw this.error(typeStart, `Unhandled format type ${exhaustive}`);
      }
    }
  }

  // Top-level `|` positions, skipping nested placeholders and quotes
  private splitChoice(start: number, end: number): Array<[number, number]> {
    const segments: Array<[number, number]> = [];
    let segStart = start;
    let depth = 0;
    let i = start;

    while (i < end) {
      const ch = this.src[i];
      if (ch === "'") {
        i = this.readQuoted(i, end).next;
        continue;
      }
      if (ch === '{') depth++;
      else if (ch === '}') depth--;
      else if (ch === '|' && depth === 0) {
        segments.push([segStart, i]);
        segStart = i + 1;
      }
      i++;
    }
    segments.push([segStart, end]);

    for (const [s, e] of segments) {
      if (this.src.slice(s, e).trim() === '') {
        throw this.error(s, 'Empty choice rule');
      }
    }
    return segments;
  }

  private findChoiceSeparator(start: number, end: number): number {
    for (let i = start; i < end; i++) {
      const ch = this.src[i];
      if (ch === '#' || ch === '<' || ch === '≤') return i;
    }
    throw this.error(start, 'Choice rule is missing "#" or "<"');
  }

  private findClosingBrace(open: number, end: number): number {
    let depth = 1;
    let i = open + 1;

    while (i < end) {
      const ch = this.src[i];
      if (ch === "'") {
        i = this.readQuoted(i, end).next;
        continue;
      }
      if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) return i;
      }
      i++;
    }
    throw this.error(open, 'Unterminated placeholder');
  }

  private readQuoted(
    at: number,
    end: number,
  ): { text: string; next: number } {
    const next = this.src[at + 1];
    if (next === "'") return { text: "'", next: at + 2 };
    if (next === undefined || at + 1 >= end || !QUOTABLE.has(next)) {
      return { text: "'", next: at + 1 };
    }

    let text = '';
    let i = at + 1;
    while (i < end) {
      if (this.src[i] === "'") {
        if (this.src[i + 1] === "'" && i + 1 < end) {
          text += "'";
          i += 2;
          continue;
        }
        return { text, next: i + 1 };
      }
      text += this.src[i];
      i++;
    }
    throw this.error(at, 'Unterminated quoted text');
  }

  private error(offset: number, reason: string): PatternParseError {
    return new PatternParseError(this.src, offset, reason);
  }
}

function parseBound(text: string): number | null {
  if (text === '∞' || text === '+∞') return Infinity;
  if (text === '-∞') return -Infinity;
  if (!/^-?\d+(\.\d+)?$/.test(text)) return null;
  return Number(text);
}

function maxIndexOf(parts: PatternPart[]): number {
  let max = -1;
  for (const part of parts) {
    if (part.kind === 'text') continue;
    max = Math.max(max, part.index);
    if (part.kind === 'choice') {
      for (const rule of part.rules) {
        max = Math.max(max, rule.pattern.maxIndex);
      }
    }
  }
  return max;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
