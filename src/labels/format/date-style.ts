import type { Locale } from 'date-fns';
import { format } from 'date-fns';
import * as locales from 'date-fns/locale';
import { formatInTimeZone } from 'date-fns-tz';

export type DateKind = 'date' | 'time' | 'datetime';

type DateStyleKeyword = 'short' | 'medium' | 'long' | 'full';

const KEYWORDS: readonly DateStyleKeyword[] = ['short', 'medium', 'long', 'full'];

function isKeyword(style: string): style is DateStyleKeyword {
  return KEYWORDS.some((keyword) => keyword === style);
}

const LOCALES_BY_CODE = new Map<string, Locale>(
  Object.values(locales).map((locale) => [locale.code.toLowerCase(), locale]),
);

/**
 * Picks the date-fns locale for a tag: exact match, then the bare language,
 * then any regional variant of that language, then `en-US`.
 */
export function dateFnsLocale(tag: string): Locale {
  const normalized = tag.replace(/_/g, '-').toLowerCase();
  const exact = LOCALES_BY_CODE.get(normalized);
  if (exact) return exact;

  const language = normalized.split('-')[0];
  const bare = LOCALES_BY_CODE.get(language);
  if (bare) return bare;

  for (const [code, locale] of LOCALES_BY_CODE) {
    if (code.startsWith(`${language}-`)) return locale;
  }
  return locales.enUS;
}

/** Layouts use date-fns tokens; a layout date-fns rejects is invalid. */
function isValidLayout(layout: string): boolean {
  try {
    format(new Date(0), layout);
    return true;
  } catch {
    return false;
  }
}

export function isValidDateStyle(style: string): boolean {
  return isKeyword(style) || isValidLayout(style);
}

/**
 * Formats a date for the `date`, `time` or untyped (`datetime`) placeholders.
 * Keyword styles go straight to `Intl.DateTimeFormat`; layouts such as
 * `dd/MM/yyyy 'at' HH:mm` are rendered by date-fns in the given time zone.
 */
export function formatDate(
  date: Date,
  locale: string,
  kind: DateKind,
  style: string | undefined,
  timeZone: string,
): string {
  if (style === undefined || isKeyword(style)) {
    return new Intl.DateTimeFormat(
      locale,
      keywordOptions(kind, style, timeZone),
    ).format(date);
  }

  return formatInTimeZone(date, timeZone, style, {
    locale: dateFnsLocale(locale),
  });
}

function keywordOptions(
  kind: DateKind,
  style: DateStyleKeyword | undefined,
  timeZone: string,
): Intl.DateTimeFormatOptions {
  switch (kind) {
    case 'date':
      return { dateStyle: style ?? 'medium', timeZone };
    case 'time':
      return { timeStyle: style ?? 'medium', timeZone };
    case 'datetime':
      return {
        dateStyle: style ?? 'short',
        timeStyle: style ?? 'short',
        timeZone,
      };
  }
}
