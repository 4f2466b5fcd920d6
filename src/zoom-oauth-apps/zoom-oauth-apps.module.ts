import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CredentialsModule } from '../credentials/credentials.module';
import { ProjectsModule } from '../projects/projects.module';
import { ZoomModule } from '../zoom/zoom.module';
import { ZoomOAuthConnectionsModule } from '../zoom-oauth-connections/zoom-oauth-connections.module';
import { ZoomOAuthApp } from './entities/zoom-oauth-app.entity';
import { ZoomOAuthAppWebhookController } from './zoom-oauth-app-webhook.controller';
import { ZoomOAuthAppsController } from './zoom-oauth-apps.controller';
import { ZoomOAuthAppsService } from './zoom-oauth-apps.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([ZoomOAuthApp]),
    CredentialsModule,
    ProjectsModule,
    ZoomModule,
    ZoomOAuthConnectionsModule,
  ],
  controllers: [ZoomOAuthAppsController, ZoomOAuthAppWebhookController],
  providers: [ZoomOAuthAppsService],
})
export class ZoomOAuthAppsModule {}
