import { Injectable, Logger } from '@nestjs/common';
import { TaskQueueService } from '../../task-queue/task-queue.service';
import { ZoomOAuthConnectionsService } from '../zoom-oauth-connections.service';

export const VALIDATE_MAX_RETRIES = 1;
export const INVALID_CLIENT_FAILURE_REASON = 'Invalid client_id or client_secret';

/**
 * After an app's client secret changes, retries the connections it had broken.
 * Only connections disconnected for an invalid client id/secret are eligible.
 */
@Injectable()
export class ValidateZoomOAuthConnectionsTask {
  private readonly logger = new Logger(ValidateZoomOAuthConnectionsTask.name);

  constructor(
    private readonly taskQueue: TaskQueueService,
    private readonly connectionsService: ZoomOAuthConnectionsService,
  ) {}

  enqueue(zoomOAuthAppId: string): void {
    this.taskQueue.enqueue(`validate-zoom-oauth-connections:${zoomOAuthAppId}`, () => this.run(zoomOAuthAppId), {
      maxRetries: VALIDATE_MAX_RETRIES,
    });
  }

  async run(zoomOAuthAppId: string): Promise<void> {
    const connections = await this.connectionsService.findDisconnectedForApp(zoomOAuthAppId);
    this.logger.log(`validate:start app=${zoomOAuthAppId} disconnected=${connections.length}`);

    let reconnected = 0;
    for (const connection of connections) {
      const reason = connection.connectionFailureData?.error;
      if (!reason || !reason.includes(INVALID_CLIENT_FAILURE_REASON)) continue;

      try {
        const accessToken = await this.connectionsService.getAccessToken(connection);
        if (!accessToken) continue;

        await this.connectionsService.markConnected(connection);
        reconnected++;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`validate:failed connection=${connection.objectId} err=${err.name}: ${err.message}`);
      }
    }

    this.logger.log(`validate:done app=${zoomOAuthAppId} reconnected=${reconnected}`);
  }
}
