import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import axios from 'axios';
import { CredentialsModule } from '../credentials/credentials.module';
import { ProjectsModule } from '../projects/projects.module';
import { TaskQueueModule } from '../task-queue/task-queue.module';
import { WebhookDeliveryAttempt } from './entities/webhook-delivery-attempt.entity';
import { WebhookSubscription } from './entities/webhook-subscription.entity';
import { WebhooksController } from './webhooks.controller';
import { WEBHOOK_HTTP_CLIENT, WebhooksService } from './webhooks.service';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forFeature([WebhookSubscription, WebhookDeliveryAttempt]),
    CredentialsModule,
    ProjectsModule,
    TaskQueueModule,
  ],
  controllers: [WebhooksController],
  providers: [
    {
      provide: WEBHOOK_HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        axios.create({ timeout: Number(config.get<string>('WEBHOOK_TIMEOUT_MS', '10000')) }),
    },
    WebhooksService,
  ],
  exports: [WebhooksService],
})
export class WebhooksModule {}
