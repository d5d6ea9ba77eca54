import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HealthController } from './health.controller';
import { LabelsModule } from './labels/labels.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    // Reads LABEL_STORE_DRIVER after ConfigModule has loaded .env
    LabelsModule.register(),
  ],
  controllers: [HealthController],
})
export class AppModule {}
