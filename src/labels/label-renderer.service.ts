import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MessagePatternFormatter } from './format/message-pattern.formatter';
import { PatternCacheService } from './format/pattern-cache.service';
import { LabelArg } from './format/pattern.types';
import { KeyDeriver } from './key/key-deriver';
import { LabelRef } from './key/label-ref';
import {
  identifierToString,
  LabelIdentifier,
  RenderContext,
  ResolvedPattern,
} from './label.types';
import { ResolutionEngine } from './resolution/resolution-engine.service';
import { LABEL_STORE, LabelStore } from './store/label-store.interface';

export interface RenderResult {
  text: string;
  identifier: LabelIdentifier;
  resolved: ResolvedPattern;
}

/**
 * Entry point for application code.
 *
 * Arguments must be passed through `args` and referenced as `{0}`, `{1}`...
 * in the text. Digits and placeholders take no part in the key, so values
 * interpolated into the text before calling `render` all get the wording
 * stored for the first one. Text that must never be translated goes through
 * `raw` instead.
 */
@Injectable()
export class LabelRenderer {
  private readonly logger = new Logger(LabelRenderer.name);
  private readonly usageStats: boolean;

  constructor(
    private readonly keyDeriver: KeyDeriver,
    private readonly engine: ResolutionEngine,
    private readonly patternCache: PatternCacheService,
    private readonly formatter: MessagePatternFormatter,
    @Inject(LABEL_STORE) private readonly store: LabelStore,
    @Optional() configService?: ConfigService,
  ) {
    this.usageStats =
      configService?.get<string>('LABEL_USAGE_STATS') === 'true';
  }

  async render(
    ref: LabelRef,
    context: RenderContext,
    args: readonly LabelArg[] = [],
  ): Promise<string> {
    const { text } = await this.renderWithDetails(ref, context, args);
    return text;
  }

  async renderWithDetails(
    ref: LabelRef,
    context: RenderContext,
    args: readonly LabelArg[] = [],
  ): Promise<RenderResult> {
    const identifier = this.keyDeriver.deriveRef(ref);
    const resolved = await this.engine.resolve(
      identifier,
      ref.defaultText,
      context,
    );

    const compiled = this.patternCache.get(resolved.pattern, {
      identifier,
      tuple: resolved.variant,
    });
    const text = this.formatter.format(compiled, args, context.locale);

    if (this.usageStats) await this.recordUsage(identifier, context);

    return { text, identifier, resolved };
  }

  /** Formats `text` as is: no key, no store, no translation. */
  raw(
    text: string,
    context: Pick<RenderContext, 'locale'>,
    args: readonly LabelArg[] = [],
  ): string {
    return this.formatter.format(
      this.patternCache.get(text),
      args,
      context.locale,
    );
  }

  private async recordUsage(
    identifier: LabelIdentifier,
    context: RenderContext,
  ): Promise<void> {
    try {
      await this.store.recordUsage(identifier, context);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Usage not recorded for ${identifierToString(identifier)}: ${reason}`,
      );
    }
  }
}
