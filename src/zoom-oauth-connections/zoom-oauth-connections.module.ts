import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CredentialsModule } from '../credentials/credentials.module';
import { ProjectsModule } from '../projects/projects.module';
import { TaskQueueModule } from '../task-queue/task-queue.module';
import { WebhooksModule } from '../webhooks/webhooks.module';
import { ZoomModule } from '../zoom/zoom.module';
import { ZoomOAuthApp } from '../zoom-oauth-apps/entities/zoom-oauth-app.entity';
import { ZoomMeetingToZoomOAuthConnectionMapping } from './entities/zoom-meeting-mapping.entity';
import { ZoomOAuthConnection } from './entities/zoom-oauth-connection.entity';
import { SyncZoomOAuthConnectionTask } from './tasks/sync-zoom-oauth-connection.task';
import { ValidateZoomOAuthConnectionsTask } from './tasks/validate-zoom-oauth-connections.task';
import { ZoomOAuthSyncScheduler } from './tasks/zoom-oauth-sync.scheduler';
import { ZoomOAuthConnectionsController } from './zoom-oauth-connections.controller';
import { ZoomOAuthConnectionsService } from './zoom-oauth-connections.service';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forFeature([ZoomOAuthConnection, ZoomMeetingToZoomOAuthConnectionMapping, ZoomOAuthApp]),
    CredentialsModule,
    ProjectsModule,
    TaskQueueModule,
    WebhooksModule,
    ZoomModule,
  ],
  controllers: [ZoomOAuthConnectionsController],
  providers: [
    ZoomOAuthConnectionsService,
    SyncZoomOAuthConnectionTask,
    ValidateZoomOAuthConnectionsTask,
    ZoomOAuthSyncScheduler,
  ],
  exports: [ZoomOAuthConnectionsService, ValidateZoomOAuthConnectionsTask],
})
export class ZoomOAuthConnectionsModule {}
