import { WebhookSubscription } from './entities/webhook-subscription.entity';

export function serializeWebhookSubscription(subscription: WebhookSubscription) {
  return {
    id: subscription.objectId,
    url: subscription.url,
    triggers: subscription.triggers,
    is_active: subscription.isActive,
    created_at: subscription.createdAt.toISOString(),
  };
}
