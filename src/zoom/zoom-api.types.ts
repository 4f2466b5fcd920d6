export interface ZoomTokenResponse {
  access_token?: string;
  token_type?: string;
  refresh_token?: string;
  expires_in?: number;
  scope?: string;
}

export interface ZoomUser {
  id: string;
  account_id: string;
  email?: string;
  first_name?: string;
  last_name?: string;
  status?: string;
  pmi?: number | string | null;
}

export interface ZoomMeeting {
  id?: number | string | null;
  uuid?: string;
  topic?: string;
  start_time?: string;
}

export interface ZoomMeetingsPage {
  page_size?: number;
  total_records?: number;
  next_page_token?: string;
  meetings?: ZoomMeeting[];
}

export interface RefreshAccessTokenParams {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface ExchangeAuthorizationCodeParams {
  code: string;
  redirectUri: string;
  clientId: string;
  clientSecret: string;
}
