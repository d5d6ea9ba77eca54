import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Redis } from 'ioredis';
import { REDIS_CLIENT } from '../../redis/redis.module';
import { readPositiveInt } from '../label.config';
import {
  identityKey,
  isInterfaceType,
  Label,
  LabelIdentifier,
  LocalizedVariant,
} from '../label.types';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isVariant(value: unknown): value is LocalizedVariant {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.locale === 'string' &&
    (v.connectorType === undefined || typeof v.connectorType === 'string') &&
    (v.interfaceType === undefined || isInterfaceType(v.interfaceType)) &&
    isStringArray(v.alternatives) &&
    typeof v.validated === 'boolean'
  );
}

export function isLabel(value: unknown): value is Label {
  if (typeof value !== 'object' || value === null) return false;
  const l: Record<string, unknown> = { ...value };
  const id: unknown = l.identifier;
  if (typeof id !== 'object' || id === null) return false;
  const identifier: Record<string, unknown> = { ...id };
  return (
    typeof identifier.namespace === 'string' &&
    typeof identifier.key === 'string' &&
    typeof l.defaultLocale === 'string' &&
    typeof l.defaultText === 'string' &&
    Array.isArray(l.variants) &&
    l.variants.every(isVariant)
  );
}

// Writes the label only while the generation key still holds the value read
// before the label was loaded
const SET_IF_GENERATION = `
if (redis.call('get', KEYS[1]) or '0') == ARGV[1] then
  redis.call('setex', KEYS[2], ARGV[2], ARGV[3])
  return 1
end
return 0
`;

/**
 * Redis read cache for labels.
 *
 * Every eviction bumps a per-label generation counter. A reader takes the
 * generation before loading a label and fills the cache with that value, so
 * a label loaded before an edit is never written back after the edit evicted
 * it.
 */
@Injectable()
export class LabelCacheService {
  private readonly LABEL_PREFIX = 'labels:label:';
  private readonly GENERATION_PREFIX = 'labels:gen:';
  private readonly ttl: number;

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    @Optional() configService?: ConfigService,
  ) {
    this.ttl = readPositiveInt(configService, 'LABEL_CACHE_TTL', 60 * 30);
  }

  async getLabel(identifier: LabelIdentifier): Promise<Label | null> {
    const cached = await this.redis.get(this.labelKey(identifier));
    if (!cached) return null;

    const parsed: unknown = JSON.parse(cached);
    return isLabel(parsed) ? parsed : null;
  }

  /** Current generation of a label, to be passed to {@link setLabel}. */
  async generation(identifier: LabelIdentifier): Promise<string> {
    return (await this.redis.get(this.generationKey(identifier))) ?? '0';
  }

  /**
   * Caches `label` unless it was evicted since `generation` was read.
   * Returns whether the label was written.
   */
  async setLabel(label: Label, generation: string): Promise<boolean> {
    const written = await this.redis.eval(
      SET_IF_GENERATION,
      2,
      this.generationKey(label.identifier),
      this.labelKey(label.identifier),
      generation,
      this.ttl,
      JSON.stringify(label),
    );
    return written === 1;
  }

  async invalidate(identifier: LabelIdentifier): Promise<void> {
    await this.redis.incr(this.generationKey(identifier));
    await this.redis.del(this.labelKey(identifier));
  }

  private labelKey(identifier: LabelIdentifier): string {
    return this.LABEL_PREFIX + identityKey(identifier);
  }

  private generationKey(identifier: LabelIdentifier): string {
    return this.GENERATION_PREFIX + identityKey(identifier);
  }
}
