import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  FOLIO_SETTINGS,
  SETTINGS_KEYS,
  loadFolioSettings,
  type FolioSettings,
} from './folio-settings';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: FOLIO_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): FolioSettings =>
        loadFolioSettings(
          Object.fromEntries(
            SETTINGS_KEYS.map((key) => [key, config.get<string>(key)])
          )
        ),
    },
  ],
  exports: [FOLIO_SETTINGS],
})
export class SettingsModule {}
