import { createHash } from 'crypto';
import { Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QUOTABLE } from '../format/message-pattern.parser';
import { readPositiveInt } from '../label.config';
import { LabelIdentifier } from '../label.types';
import { LabelRef } from './label-ref';

const SEPARATOR = '_';
const HASH_LENGTH = 8;
const DEFAULT_SEGMENT_LENGTH = 64;
const DEFAULT_TEXT_LENGTH = 100;

/**
 * Removes every `{...}` placeholder (nested choice bodies included) and every
 * digit run, so texts differing only in interpolated values share one key.
 * Apostrophes quote the way the pattern parser reads them: quoted text is
 * literal and its braces never open or close a placeholder.
 */
export function normalizeDefaultText(text: string): string {
  const chars = Array.from(text);
  let depth = 0;
  let out = '';
  const keep = (value: string) => {
    if (depth === 0) out += value;
  };

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (ch === "'") {
      const next = chars[i + 1];
      if (next === "'") {
        keep("'");
        i++;
      } else if (next !== undefined && QUOTABLE.has(next)) {
        i = skipQuoted(chars, i + 1, keep);
      } else {
        keep(ch);
      }
    } else if (ch === '{') {
      depth++;
      out += ' ';
    } else if (ch === '}') {
      if (depth > 0) depth--;
      out += ' ';
    } else {
      keep(ch);
    }
  }
  return out.replace(/\p{Nd}+/gu, ' ');
}

// Feeds quoted text from `start` to `keep`; returns the closing quote index
function skipQuoted(
  chars: string[],
  start: number,
  keep: (value: string) => void,
): number {
  let i = start;
  while (i < chars.length) {
    if (chars[i] === "'") {
      if (chars[i + 1] !== "'") return i;
      keep("'");
      i += 2;
      continue;
    }
    keep(chars[i]);
    i++;
  }
  return i;
}

export function slug(value: string, maxLength: number): string {
  const full = value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, SEPARATOR)
    .replace(/^_+|_+$/g, '');

  // Code points, not UTF-16 units, so a cut never splits a surrogate pair
  const chars = Array.from(full);
  if (chars.length <= maxLength) return full;

  const hash = createHash('sha256')
    .update(full)
    .digest('hex')
    .slice(0, HASH_LENGTH);
  const head = chars
    .slice(0, Math.max(0, maxLength - HASH_LENGTH - 1))
    .join('')
    .replace(/_+$/, '');
  return `${head}${SEPARATOR}${hash}`;
}

@Injectable()
export class KeyDeriver {
  private readonly maxSegmentLength: number;
  private readonly maxTextLength: number;

  constructor(@Optional() configService?: ConfigService) {
    this.maxSegmentLength = DEFAULT_SEGMENT_LENGTH;
    this.maxTextLength = readPositiveInt(
      configService,
      'LABEL_KEY_MAX_LENGTH',
      DEFAULT_TEXT_LENGTH,
    );
  }

  derive(
    namespace: string,
    category: string,
    defaultText: string,
    explicitKey?: string,
  ): LabelIdentifier {
    if (explicitKey !== undefined) {
      return { namespace, key: explicitKey };
    }

    const key = [
      slug(namespace, this.maxSegmentLength),
      slug(category, this.maxSegmentLength),
      slug(normalizeDefaultText(defaultText), this.maxTextLength),
    ].join(SEPARATOR);

    return { namespace, key };
  }

  deriveRef(ref: LabelRef): LabelIdentifier {
    return this.derive(
      ref.namespace,
      ref.category,
      ref.defaultText,
      ref.explicitKey,
    );
  }
}
