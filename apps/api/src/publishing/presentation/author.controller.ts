import { Controller, Get, Inject } from '@nestjs/common';
import type { RecordSigner } from '@folio/record-codec';
import { INSTANCE_SIGNER } from '../infrastructure/instance-signer.provider';

@Controller('author')
export class AuthorController {
  constructor(
    @Inject(INSTANCE_SIGNER) private readonly signer: RecordSigner | null
  ) {}

  @Get()
  show(): { authorKey: string | null } {
    return { authorKey: this.signer?.authorKey ?? null };
  }
}
