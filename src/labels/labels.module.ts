import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule } from '../database/database.module';
import { KyselyLabelStore } from '../database/repositories/label.repository';
import { RedisModule } from '../redis/redis.module';
import { MessagePatternFormatter } from './format/message-pattern.formatter';
import { PatternCacheService } from './format/pattern-cache.service';
import { KeyDeriver } from './key/key-deriver';
import { LabelRenderer } from './label-renderer.service';
import { LabelsController } from './labels.controller';
import { LabelsService } from './labels.service';
import {
  createRandomSource,
  RANDOM_SOURCE,
} from './resolution/random-source';
import { ResolutionEngine } from './resolution/resolution-engine.service';
import { InMemoryLabelStore } from './store/in-memory-label.store';
import { LabelCacheService } from './store/label-cache.service';
import { LABEL_STORE } from './store/label-store.interface';

export type LabelStoreDriver = 'mysql' | 'memory';

export function resolveStoreDriver(value: string | undefined): LabelStoreDriver {
  return value === 'memory' ? 'memory' : 'mysql';
}

const engineProviders: Provider[] = [
  KeyDeriver,
  MessagePatternFormatter,
  PatternCacheService,
  ResolutionEngine,
  LabelRenderer,
  LabelsService,
  {
    provide: RANDOM_SOURCE,
    inject: [ConfigService],
    useFactory: (configService: ConfigService) =>
      createRandomSource(configService.get<string>('LABEL_RANDOM_SEED')),
  },
];

@Module({})
export class LabelsModule {
  /**
   * `mysql` stores labels through Kysely with a Redis read cache;
   * `memory` keeps them in process (local runs, tests).
   */
  static register(
    driver: LabelStoreDriver = resolveStoreDriver(process.env.LABEL_STORE_DRIVER),
  ): DynamicModule {
    const storeProviders: Provider[] =
      driver === 'memory'
        ? [{ provide: LABEL_STORE, useClass: InMemoryLabelStore }]
        : [
            LabelCacheService,
            KyselyLabelStore,
            { provide: LABEL_STORE, useExisting: KyselyLabelStore },
          ];

    return {
      module: LabelsModule,
      imports: driver === 'memory' ? [] : [DatabaseModule, RedisModule],
      controllers: [LabelsController],
      providers: [...engineProviders, ...storeProviders],
      exports: [LabelRenderer, LabelsService, LABEL_STORE],
    };
  }
}
