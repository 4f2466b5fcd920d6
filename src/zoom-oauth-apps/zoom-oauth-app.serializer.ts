import { ZoomOAuthApp } from './entities/zoom-oauth-app.entity';

export function serializeZoomOAuthApp(app: ZoomOAuthApp) {
  return {
    id: app.objectId,
    client_id: app.clientId,
    created_at: app.createdAt.toISOString(),
    updated_at: app.updatedAt.toISOString(),
  };
}
