import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TaskQueueService } from './task-queue.service';

@Module({
  imports: [ConfigModule],
  providers: [TaskQueueService],
  exports: [TaskQueueService],
})
export class TaskQueueModule {}
