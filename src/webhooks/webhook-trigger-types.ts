export const WEBHOOK_TRIGGER_TYPES = ['zoom_oauth_connection.state_change'] as const;

export type WebhookTriggerType = (typeof WEBHOOK_TRIGGER_TYPES)[number];

export const WEBHOOK_TRIGGER_ZOOM_OAUTH_CONNECTION_STATE_CHANGE: WebhookTriggerType =
  'zoom_oauth_connection.state_change';
