import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  FOLIO_SETTINGS,
  type FolioSettings,
} from '@platform/config/folio-settings';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const settings = app.get<FolioSettings>(FOLIO_SETTINGS);
  await app.listen(settings.port);
  new Logger('Bootstrap').log(`Listening on port ${settings.port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
});
