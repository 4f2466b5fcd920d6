import { ZoomOAuthConnection } from './entities/zoom-oauth-connection.entity';

/** Public representation, shared by the API and webhook payloads. Credentials stay out. */
export function serializeZoomOAuthConnection(connection: ZoomOAuthConnection) {
  return {
    id: connection.objectId,
    zoom_oauth_app: connection.zoomOAuthApp.objectId,
    state: connection.state,
    metadata: connection.metadata,
    user_id: connection.userId,
    account_id: connection.accountId,
    connection_failure_data: connection.connectionFailureData,
    created_at: connection.createdAt.toISOString(),
    updated_at: connection.updatedAt.toISOString(),
  };
}
