import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CredentialsModule } from './credentials/credentials.module';
import { ProjectsModule } from './projects/projects.module';
import { TaskQueueModule } from './task-queue/task-queue.module';
import { WebhooksModule } from './webhooks/webhooks.module';
import { ZoomModule } from './zoom/zoom.module';
import { ZoomOAuthAppsModule } from './zoom-oauth-apps/zoom-oauth-apps.module';
import { ZoomOAuthConnectionsModule } from './zoom-oauth-connections/zoom-oauth-connections.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const useSsl = config.get('DB_SSL') === 'true';
        return {
          type: 'postgres',
          host: config.get<string>('DB_HOST'),
          port: parseInt(config.get<string>('DB_PORT', '5432'), 10),
          username: config.get<string>('DB_USER'),
          password: config.get<string>('DB_PASS'),
          database: config.get<string>('DB_NAME'),
          autoLoadEntities: true,
          synchronize: config.get('DB_SYNCHRONIZE') === 'true',
          ssl: useSsl ? { rejectUnauthorized: false } : false,
        };
      },
    }),
    ScheduleModule.forRoot(),
    CredentialsModule,
    TaskQueueModule,
    ProjectsModule,
    ZoomModule,
    WebhooksModule,
    ZoomOAuthConnectionsModule,
    ZoomOAuthAppsModule,
  ],
})
export class AppModule {}
