import { Injectable, Logger } from '@nestjs/common';
import { TaskQueueService } from '../../task-queue/task-queue.service';
import { ZoomApiClient } from '../../zoom/zoom-api.client';
import { ZoomApiAuthenticationError } from '../../zoom/zoom-api.errors';
import { ZoomOAuthConnectionsService } from '../zoom-oauth-connections.service';

export const SYNC_MAX_RETRIES = 6;

/**
 * Refreshes the connection's token, lists its meetings and PMI, and points the
 * meeting mappings at it. Authentication failures disconnect the connection and
 * end the job; any other failure is rethrown for the queue to retry.
 */
@Injectable()
export class SyncZoomOAuthConnectionTask {
  private readonly logger = new Logger(SyncZoomOAuthConnectionTask.name);

  constructor(
    private readonly taskQueue: TaskQueueService,
    private readonly connectionsService: ZoomOAuthConnectionsService,
    private readonly zoomApi: ZoomApiClient,
  ) {}

  enqueue(zoomOAuthConnectionId: string): void {
    this.taskQueue.enqueue(`sync-zoom-oauth-connection:${zoomOAuthConnectionId}`, () => this.run(zoomOAuthConnectionId), {
      maxRetries: SYNC_MAX_RETRIES,
      unique: true,
    });
  }

  async run(zoomOAuthConnectionId: string): Promise<void> {
    const connection = await this.connectionsService.findById(zoomOAuthConnectionId);
    if (!connection) {
      this.logger.warn(`sync:skip connection=${zoomOAuthConnectionId} reason=not-found`);
      return;
    }

    this.logger.log(`sync:start connection=${connection.objectId}`);
    const startedAt = new Date();

    try {
      const accessToken = await this.connectionsService.getAccessToken(connection);
      const meetings = await this.zoomApi.listMeetings(accessToken);
      const personalMeetingId = await this.zoomApi.getPersonalMeetingId(accessToken);
      this.logger.log(`sync:fetched connection=${connection.objectId} meetings=${meetings.length}`);

      await this.connectionsService.upsertMeetingMappings(
        [...meetings.map((meeting) => meeting.id), personalMeetingId],
        connection,
      );
      await this.connectionsService.recordSuccessfulSync(connection, startedAt, new Date());
      this.logger.log(`sync:done connection=${connection.objectId}`);
    } catch (error) {
      if (error instanceof ZoomApiAuthenticationError) {
        await this.connectionsService.handleAuthenticationError(connection, error);
        return;
      }
      await this.connectionsService.recordAttemptedSync(connection, new Date());
      throw error;
    }
  }
}
