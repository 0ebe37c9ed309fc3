import {
  Inject,
  Injectable,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { RelayGateway } from '@folio/relay-gateway';

/** Ties the gateway's pending-delivery loop to the application lifecycle. */
@Injectable()
export class RelayRetryLoop implements OnApplicationBootstrap, OnModuleDestroy {
  constructor(@Inject(RelayGateway) private readonly gateway: RelayGateway) {}

  onApplicationBootstrap(): void {
    this.gateway.start();
  }

  onModuleDestroy(): void {
    this.gateway.stop();
  }
}
