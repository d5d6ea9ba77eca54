import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const logger = new Logger('LabelConfig');

/**
 * Reads a positive integer setting. Unset, malformed, zero or negative
 * values fall back to `fallback`; malformed ones are logged.
 */
export function readPositiveInt(
  configService: ConfigService | undefined,
  name: string,
  fallback: number,
): number {
  const raw = configService?.get<string | number>(name);
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (Number.isInteger(value) && value > 0) return value;

  logger.warn(`${name}=${String(raw)} is not a positive integer, using ${fallback}`);
  return fallback;
}
