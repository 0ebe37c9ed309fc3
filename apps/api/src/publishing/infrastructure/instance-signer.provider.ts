import { Logger, type FactoryProvider } from '@nestjs/common';
import { LocalRecordSigner, type RecordSigner } from '@folio/record-codec';
import {
  FOLIO_SETTINGS,
  type FolioSettings,
} from '@platform/config/folio-settings';

export const INSTANCE_SIGNER = Symbol('INSTANCE_SIGNER');

const logger = new Logger('InstanceSigner');

/**
 * Signer for the instance author, or null when no key is configured. The
 * seed stays inside the signer; only the public key is logged.
 */
export const createInstanceSigner = (
  signingKey: string | null
): RecordSigner | null => {
  if (!signingKey) {
    logger.warn('FOLIO_SIGNING_KEY is not set; local publishing is disabled');
    return null;
  }
  const signer = LocalRecordSigner.fromSeedHex(signingKey);
  logger.log(`Instance author ${signer.authorKey}`);
  return signer;
};

export const instanceSignerProvider: FactoryProvider<RecordSigner | null> = {
  provide: INSTANCE_SIGNER,
  inject: [FOLIO_SETTINGS],
  useFactory: (settings: FolioSettings) =>
    createInstanceSigner(settings.signingKey),
};
