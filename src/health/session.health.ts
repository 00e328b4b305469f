import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { SessionServerService } from '../session/session-server.service';

/**
 * Up while the line-protocol listener is bound.
 */
@Injectable()
export class SessionHealthIndicator {
  constructor(
    private readonly sessionServer: SessionServerService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);
    const details = {
      listening: this.sessionServer.isListening(),
      port: this.sessionServer.getListeningPort(),
      connections: this.sessionServer.connectionCount,
    };

    return Promise.resolve(details.listening ? indicator.up(details) : indicator.down(details));
  }
}
