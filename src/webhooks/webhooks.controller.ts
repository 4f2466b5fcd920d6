import { Body, Controller, Delete, Get, HttpCode, Param, Post, UseGuards } from '@nestjs/common';
import { ApiKeyAuthGuard, CurrentProject } from '../projects/api-key-auth.guard';
import { Project } from '../projects/entities/project.entity';
import { CreateWebhookDto } from './dto/create-webhook.dto';
import { serializeWebhookSubscription } from './webhook.serializer';
import { WebhooksService } from './webhooks.service';

@Controller('api/v1/webhooks')
@UseGuards(ApiKeyAuthGuard)
export class WebhooksController {
  constructor(private readonly webhooksService: WebhooksService) {}

  @Get()
  async list(@CurrentProject() project: Project) {
    const subscriptions = await this.webhooksService.listSubscriptions(project);
    return subscriptions.map(serializeWebhookSubscription);
  }

  @Post()
  async create(@CurrentProject() project: Project, @Body() dto: CreateWebhookDto) {
    const { subscription, secret } = await this.webhooksService.createSubscription(project, dto);
    return { ...serializeWebhookSubscription(subscription), secret };
  }

  @Delete(':objectId')
  @HttpCode(204)
  async remove(@CurrentProject() project: Project, @Param('objectId') objectId: string): Promise<void> {
    await this.webhooksService.deleteSubscription(project, objectId);
  }
}
