import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import * as qs from 'qs';
import { isRecord, readString } from '../common/is-record';
import { AUTHENTICATION_ERROR_CODES, ZoomApiAuthenticationError, ZoomApiError } from './zoom-api.errors';
import {
  ExchangeAuthorizationCodeParams,
  RefreshAccessTokenParams,
  ZoomMeeting,
  ZoomMeetingsPage,
  ZoomTokenResponse,
  ZoomUser,
} from './zoom-api.types';

export const ZOOM_HTTP_CLIENT = Symbol('ZOOM_HTTP_CLIENT');
export const ZOOM_TOKEN_URL = 'https://zoom.us/oauth/token';
export const ZOOM_API_BASE_URL = 'https://api.zoom.us/v2';

const MEETINGS_PAGE_SIZE = 300;
const FORM_HEADERS = { 'Content-Type': 'application/x-www-form-urlencoded' };

@Injectable()
export class ZoomApiClient {
  private readonly logger = new Logger(ZoomApiClient.name);

  constructor(@Inject(ZOOM_HTTP_CLIENT) private readonly http: AxiosInstance) {}

  async refreshAccessToken(params: RefreshAccessTokenParams): Promise<ZoomTokenResponse> {
    const body = qs.stringify({
      grant_type: 'refresh_token',
      refresh_token: params.refreshToken,
      client_id: params.clientId,
      client_secret: params.clientSecret,
    });

    try {
      const { data } = await this.http.post<ZoomTokenResponse>(ZOOM_TOKEN_URL, body, { headers: FORM_HEADERS });
      return data;
    } catch (error) {
      throw this.toZoomApiError(error, 'Failed to refresh Zoom access token');
    }
  }

  async exchangeAuthorizationCode(params: ExchangeAuthorizationCodeParams): Promise<ZoomTokenResponse> {
    const auth = Buffer.from(`${params.clientId}:${params.clientSecret}`).toString('base64');
    const body = qs.stringify({
      grant_type: 'authorization_code',
      code: params.code,
      redirect_uri: params.redirectUri,
    });

    try {
      const { data } = await this.http.post<ZoomTokenResponse>(ZOOM_TOKEN_URL, body, {
        headers: { ...FORM_HEADERS, Authorization: `Basic ${auth}` },
      });
      return data;
    } catch (error) {
      throw this.toZoomApiError(error, 'Failed to exchange Zoom authorization code');
    }
  }

  async getCurrentUser(accessToken: string): Promise<ZoomUser> {
    return this.get<ZoomUser>('/users/me', accessToken);
  }

  async getPersonalMeetingId(accessToken: string): Promise<string | null> {
    const user = await this.getCurrentUser(accessToken);
    return user.pmi === undefined || user.pmi === null || user.pmi === '' ? null : String(user.pmi);
  }

  /** Every scheduled meeting of the token's user, following `next_page_token`. */
  async listMeetings(accessToken: string): Promise<ZoomMeeting[]> {
    const meetings: ZoomMeeting[] = [];
    let nextPageToken: string | undefined;
    let page = 0;

    do {
      const params: Record<string, string | number> = { page_size: MEETINGS_PAGE_SIZE };
      if (nextPageToken) params.next_page_token = nextPageToken;

      page++;
      this.logger.debug(`Fetching Zoom meetings page ${page}`);
      const data = await this.get<ZoomMeetingsPage>('/users/me/meetings', accessToken, params);

      meetings.push(...(data.meetings ?? []));
      nextPageToken = data.next_page_token || undefined;
    } while (nextPageToken);

    return meetings;
  }

  /**
   * Zoom answers `invalid_client` to any token request made with a bad client id
   * or secret, before it looks at the grant itself.
   */
  async clientCredentialsAreValid(clientId: string, clientSecret: string): Promise<boolean> {
    try {
      await this.refreshAccessToken({ clientId, clientSecret, refreshToken: 'credentials-check' });
      return true;
    } catch (error) {
      if (error instanceof ZoomApiAuthenticationError) {
        return error.code !== 'invalid_client';
      }
      throw error;
    }
  }

  private async get<T>(path: string, accessToken: string, params?: Record<string, string | number>): Promise<T> {
    try {
      const { data } = await this.http.get<T>(`${ZOOM_API_BASE_URL}${path}`, {
        params,
        headers: { Authorization: `Bearer ${accessToken}` },
      });
      return data;
    } catch (error) {
      throw this.toZoomApiError(error, `Zoom API request GET ${path} failed`);
    }
  }

  private toZoomApiError(error: unknown, context: string): ZoomApiError {
    if (axios.isAxiosError(error) && error.response) {
      const body: unknown = error.response.data;
      const code = isRecord(body) ? readString(body, 'error') : undefined;
      const rendered = typeof body === 'string' ? body : JSON.stringify(body);

      if (code && AUTHENTICATION_ERROR_CODES.has(code)) {
        return new ZoomApiAuthenticationError(`${context}. Zoom authentication error: ${rendered}`, code);
      }
      return new ZoomApiError(`${context}. Status: ${error.response.status}. Response body: ${rendered}`);
    }
    return new ZoomApiError(`${context}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
