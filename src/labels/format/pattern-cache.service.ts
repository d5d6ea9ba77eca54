import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readPositiveInt } from '../label.config';
import {
  identifierToString,
  identityKey,
  LabelIdentifier,
  tupleToString,
  VariantTuple,
} from '../label.types';
import { parsePattern } from './message-pattern.parser';
import { CompiledPattern } from './pattern.types';

export interface PatternScope {
  identifier: LabelIdentifier;
  // null when the label's default text was used instead of a variant
  tuple: VariantTuple | null;
}

const RAW_SCOPE = 'raw';
const SEP = '\u0000';

@Injectable()
export class PatternCacheService {
  private readonly logger = new Logger(PatternCacheService.name);
  private readonly maxEntries: number;
  private readonly entries = new Map<string, CompiledPattern>();

  constructor(@Optional() configService?: ConfigService) {
    this.maxEntries = readPositiveInt(
      configService,
      'LABEL_PATTERN_CACHE_SIZE',
      5000,
    );
  }

  /**
   * Compiled form of `pattern`, parsed at most once per scope. Parse errors
   * propagate and leave the cache untouched.
   */
  get(pattern: string, scope?: PatternScope): CompiledPattern {
    const cacheKey = this.cacheKey(pattern, scope);
    const cached = this.entries.get(cacheKey);
    if (cached) return cached;

    const compiled = parsePattern(pattern);

    if (this.entries.size >= this.maxEntries) {
      // Map iterates in insertion order: drop the oldest entry
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(cacheKey, compiled);
    return compiled;
  }

  /**
   * Drops compiled patterns of one label, limited to one variant tuple when
   * given. Returns the number of evicted entries.
   */
  invalidate(identifier: LabelIdentifier, tuple?: VariantTuple): number {
    const prefix = tuple
      ? this.scopePrefix({ identifier, tuple })
      : identityKey(identifier) + SEP;

    let evicted = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.logger.debug(
        `Evicted ${evicted} compiled pattern(s) of ${identifierToString(identifier)}`,
      );
    }
    return evicted;
  }

  get size(): number {
    return this.entries.size;
  }

  private cacheKey(pattern: string, scope?: PatternScope): string {
    return (scope ? this.scopePrefix(scope) : RAW_SCOPE + SEP) + pattern;
  }

  private scopePrefix(scope: PatternScope): string {
    const tuple = scope.tuple ? tupleToString(scope.tuple) : '';
    return identityKey(scope.identifier) + SEP + tuple + SEP;
  }
}
