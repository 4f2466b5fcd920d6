export class ZoomApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ZoomApiError';
  }
}

/**
 * The provider rejected the credentials (revoked grant, wrong client secret...).
 * Retrying will not help until someone re-authorizes or fixes the app.
 */
export class ZoomApiAuthenticationError extends ZoomApiError {
  constructor(message: string, readonly code?: string) {
    super(message);
    this.name = 'ZoomApiAuthenticationError';
  }
}

export const AUTHENTICATION_ERROR_CODES: ReadonlySet<string> = new Set([
  'invalid_grant',
  'invalid_client',
  'invalid_token',
  'unauthorized_client',
]);
