import { ArrayNotEmpty, IsArray, IsIn, IsUrl } from 'class-validator';
import { WEBHOOK_TRIGGER_TYPES, WebhookTriggerType } from '../webhook-trigger-types';

export class CreateWebhookDto {
  @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
  url!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsIn(WEBHOOK_TRIGGER_TYPES, { each: true })
  triggers!: WebhookTriggerType[];
}
