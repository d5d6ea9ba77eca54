import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { LABEL_STORE, LabelStore } from './labels/store/label-store.interface';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(@Inject(LABEL_STORE) private readonly store: LabelStore) {}

  @Get()
  @ApiOperation({ summary: 'Health check' })
  check() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  @Get('store')
  @ApiOperation({ summary: 'Label store connectivity check' })
  async checkStore() {
    try {
      let timer: NodeJS.Timeout | undefined;
      await Promise.race([
        this.store.ping(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error('Label store timeout')),
            5000,
          );
        }),
      ]).finally(() => clearTimeout(timer));

      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        store: { connected: true },
      };
    } catch (err) {
      const error = err instanceof Error ? err : new Error('Unknown error');
      return {
        status: 'error',
        timestamp: new Date().toISOString(),
        store: { connected: false, error: error.message },
      };
    }
  }
}
