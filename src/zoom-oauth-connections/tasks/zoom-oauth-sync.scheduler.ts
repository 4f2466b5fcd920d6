import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { ZoomOAuthConnection } from '../entities/zoom-oauth-connection.entity';
import { ZoomOAuthConnectionsService } from '../zoom-oauth-connections.service';
import { SyncZoomOAuthConnectionTask } from './sync-zoom-oauth-connection.task';

const DEFAULT_SYNC_INTERVAL_MINUTES = 30;

@Injectable()
export class ZoomOAuthSyncScheduler {
  private readonly logger = new Logger(ZoomOAuthSyncScheduler.name);

  constructor(
    private readonly config: ConfigService,
    private readonly connectionsService: ZoomOAuthConnectionsService,
    private readonly syncTask: SyncZoomOAuthConnectionTask,
  ) {}

  // Every 5 minutes; each connection is synced at most once per interval
  @Cron('*/5 * * * *')
  async enqueueDueSyncs(): Promise<number> {
    const intervalMinutes = this.syncIntervalMinutes();
    let connections: ZoomOAuthConnection[];
    try {
      connections = await this.connectionsService.findConnectionsDueForSync(new Date(), intervalMinutes);
    } catch (e) {
      this.logger.warn(`sync-scheduler:query-failed err=${e instanceof Error ? e.message : String(e)}`);
      return 0;
    }

    for (const connection of connections) {
      this.syncTask.enqueue(connection.id);
    }
    if (connections.length > 0) {
      this.logger.log(`sync-scheduler:enqueued count=${connections.length} intervalMinutes=${intervalMinutes}`);
    }
    return connections.length;
  }

  private syncIntervalMinutes(): number {
    const raw = this.config.get<string | number>('ZOOM_OAUTH_SYNC_INTERVAL_MINUTES');
    const n = Number(raw);
    return raw === undefined || raw === '' || !Number.isFinite(n) || n <= 0 ? DEFAULT_SYNC_INTERVAL_MINUTES : n;
  }
}
