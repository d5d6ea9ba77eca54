const DECIMAL_PATTERN = /^[#0,]*0?(\.[0#]+)?$/;
const CURRENCY_STYLE = /^currency:([A-Za-z]{3})$/;

/**
 * Maps a number placeholder style to `Intl.NumberFormat` options.
 * Returns null for a style that is not recognized.
 *
 * Supported: `integer`, `percent`, `currency:EUR`, and decimal patterns
 * such as `#,##0.00` or `0.###`.
 */
export function compileNumberStyle(
  style: string,
): Intl.NumberFormatOptions | null {
  if (style === 'integer') {
    return { maximumFractionDigits: 0 };
  }
  if (style === 'percent') {
    return { style: 'percent' };
  }

  const currency = CURRENCY_STYLE.exec(style);
  if (currency) {
    return { style: 'currency', currency: currency[1].toUpperCase() };
  }

  if (!style.includes('0') && !style.includes('#')) return null;
  if (!DECIMAL_PATTERN.test(style)) return null;

  const [integerPart, fractionPart = ''] = style.split('.');
  const minimumIntegerDigits = Math.max(
    1,
    (integerPart.match(/0/g) ?? []).length,
  );
  const minimumFractionDigits = (fractionPart.match(/0/g) ?? []).length;
  const maximumFractionDigits = fractionPart.length;

  // `0#` in the fraction is not a pattern Intl can express
  if (/#0/.test(fractionPart)) return null;

  return {
    useGrouping: integerPart.includes(','),
    minimumIntegerDigits,
    minimumFractionDigits,
    maximumFractionDigits,
  };
}

// keyed by locale and options; styles come from stored patterns and argument
// overrides, so the set is open-ended
const MAX_CACHED_FORMATTERS = 256;
const formatters = new Map<string, Intl.NumberFormat>();

export function cachedNumberFormatterCount(): number {
  return formatters.size;
}

export function formatNumber(
  value: number,
  locale: string,
  options: Intl.NumberFormatOptions = {},
): string {
  const cacheKey = `${locale}|${JSON.stringify(options)}`;
  let formatter = formatters.get(cacheKey);
  if (!formatter) {
    formatter = new Intl.NumberFormat(locale, options);
    if (formatters.size >= MAX_CACHED_FORMATTERS) {
      const oldest = formatters.keys().next();
      if (!oldest.done) formatters.delete(oldest.value);
    }
    formatters.set(cacheKey, formatter);
  }
  return formatter.format(value);
}
