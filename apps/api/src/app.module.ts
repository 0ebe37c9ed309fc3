import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SettingsModule } from '@platform/config/settings.module';
import { DatabaseModule } from '@platform/infrastructure/database/database.module';
import { HealthController } from '@platform/presentation/health.controller';
import { PublishingModule } from '@publishing/presentation/publishing.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    SettingsModule,
    DatabaseModule,
    PublishingModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
