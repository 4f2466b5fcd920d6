import { isRecord, readString } from '../common/is-record';
import { CredentialsCipher } from '../credentials/credentials-cipher.service';
import { ZoomOAuthApp } from './entities/zoom-oauth-app.entity';

export interface ZoomOAuthAppCredentials {
  client_secret?: string;
  webhook_secret?: string;
}

export function readZoomOAuthAppCredentials(cipher: CredentialsCipher, app: ZoomOAuthApp): ZoomOAuthAppCredentials {
  if (!app.encryptedCredentials) return {};
  const stored = cipher.decryptJson(app.encryptedCredentials);
  if (!isRecord(stored)) return {};
  return {
    client_secret: readString(stored, 'client_secret'),
    webhook_secret: readString(stored, 'webhook_secret'),
  };
}

export function writeZoomOAuthAppCredentials(
  cipher: CredentialsCipher,
  app: ZoomOAuthApp,
  credentials: ZoomOAuthAppCredentials,
): void {
  app.encryptedCredentials = cipher.encryptJson(credentials);
}
