import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, IsNull, LessThan, Repository } from 'typeorm';
import { CursorPage, decodeCursor, toCursorPage } from '../common/cursor-pagination';
import { isRecord, readString } from '../common/is-record';
import { CredentialsCipher } from '../credentials/credentials-cipher.service';
import { Project } from '../projects/entities/project.entity';
import { WEBHOOK_TRIGGER_ZOOM_OAUTH_CONNECTION_STATE_CHANGE } from '../webhooks/webhook-trigger-types';
import { WebhooksService } from '../webhooks/webhooks.service';
import { ZoomApiClient } from '../zoom/zoom-api.client';
import { ZoomApiAuthenticationError, ZoomApiError } from '../zoom/zoom-api.errors';
import { ZoomTokenResponse, ZoomUser } from '../zoom/zoom-api.types';
import { ZoomOAuthApp } from '../zoom-oauth-apps/entities/zoom-oauth-app.entity';
import { readZoomOAuthAppCredentials } from '../zoom-oauth-apps/zoom-oauth-app-credentials';
import { CreateZoomOAuthConnectionDto } from './dto/create-zoom-oauth-connection.dto';
import { ZoomMeetingToZoomOAuthConnectionMapping } from './entities/zoom-meeting-mapping.entity';
import { ZoomOAuthConnection } from './entities/zoom-oauth-connection.entity';
import { serializeZoomOAuthConnection } from './zoom-oauth-connection.serializer';

export const REQUIRED_ZOOM_SCOPES = [
  'user:read:user',
  'user:read:zak',
  'meeting:read:list_meetings',
  'meeting:read:local_recording_token',
];

const PAGE_SIZE = 25;
const CONNECTION_RELATIONS = { zoomOAuthApp: true } as const;

export interface MeetingMappingUpsertResult {
  created: number;
  updated: number;
}

type ZoomOAuthConnectionSyncState = Partial<
  Pick<
    ZoomOAuthConnection,
    | 'state'
    | 'connectionFailureData'
    | 'lastSuccessfulSyncStartedAt'
    | 'lastSuccessfulSyncAt'
    | 'lastAttemptedSyncAt'
  >
>;

interface ZoomOAuthConnectionCredentials {
  refresh_token?: string;
}

@Injectable()
export class ZoomOAuthConnectionsService {
  private readonly logger = new Logger(ZoomOAuthConnectionsService.name);

  constructor(
    @InjectRepository(ZoomOAuthConnection)
    private readonly connectionRepo: Repository<ZoomOAuthConnection>,
    @InjectRepository(ZoomMeetingToZoomOAuthConnectionMapping)
    private readonly mappingRepo: Repository<ZoomMeetingToZoomOAuthConnectionMapping>,
    @InjectRepository(ZoomOAuthApp)
    private readonly appRepo: Repository<ZoomOAuthApp>,
    private readonly cipher: CredentialsCipher,
    private readonly zoomApi: ZoomApiClient,
    private readonly webhooksService: WebhooksService,
  ) {}

  /**
   * Exchanges the authorization code, checks the grant and the user, and stores
   * the refresh token. Every rejection is a 400 carrying the reason.
   */
  async create(project: Project, dto: CreateZoomOAuthConnectionDto): Promise<ZoomOAuthConnection> {
    const app = await this.appRepo.findOne({ where: { objectId: dto.zoom_oauth_app_id, projectId: project.id } });
    if (!app) {
      throw new BadRequestException(`Zoom OAuth App with id ${dto.zoom_oauth_app_id} does not exist in this project.`);
    }
    const { client_secret: clientSecret } = readZoomOAuthAppCredentials(this.cipher, app);
    if (!clientSecret) {
      throw new BadRequestException(`Zoom OAuth App with id ${app.objectId} has no client secret.`);
    }

    let tokens: ZoomTokenResponse;
    try {
      tokens = await this.zoomApi.exchangeAuthorizationCode({
        code: dto.authorization_code,
        redirectUri: dto.redirect_uri,
        clientId: app.clientId,
        clientSecret,
      });
    } catch (error) {
      throw new BadRequestException(`Error exchanging access code for tokens: ${messageOf(error)}`);
    }
    if (!tokens.access_token || !tokens.refresh_token) {
      throw new BadRequestException(
        'Error exchanging access code for tokens: the response did not include an access_token and a refresh_token',
      );
    }

    const granted = new Set((tokens.scope ?? '').split(/\s+/).filter(Boolean));
    const missingScopes = REQUIRED_ZOOM_SCOPES.filter((scope) => !granted.has(scope));
    if (missingScopes.length > 0) {
      throw new BadRequestException(
        `The Zoom OAuth App is missing the following required scopes: ${missingScopes.join(', ')}`,
      );
    }

    let user: ZoomUser;
    try {
      user = await this.zoomApi.getCurrentUser(tokens.access_token);
    } catch (error) {
      throw new BadRequestException(`Error fetching the Zoom user: ${messageOf(error)}`);
    }
    if (user.status !== 'active') {
      throw new BadRequestException('The Zoom user is not active.');
    }

    const existing = await this.connectionRepo.findOne({ where: { zoomOAuthAppId: app.id, userId: user.id } });
    if (existing) {
      throw new BadRequestException(
        `A Zoom OAuth Connection for user ${user.id} already exists for Zoom OAuth App ${app.objectId}.`,
      );
    }

    const connection = await this.connectionRepo.save(
      this.connectionRepo.create({
        zoomOAuthAppId: app.id,
        userId: user.id,
        accountId: user.account_id,
        state: 'connected',
        metadata: dto.metadata ?? null,
        connectionFailureData: null,
        encryptedCredentials: this.cipher.encryptJson({ refresh_token: tokens.refresh_token }),
      }),
    );
    connection.zoomOAuthApp = app;
    this.logger.log(`connection:created id=${connection.objectId} app=${app.objectId} user=${user.id}`);
    return connection;
  }

  /** Newest first. */
  async list(project: Project, cursor?: string): Promise<CursorPage<ZoomOAuthConnection>> {
    const offset = decodeCursor(cursor);
    const rows = await this.connectionRepo.find({
      where: { zoomOAuthApp: { projectId: project.id } },
      relations: CONNECTION_RELATIONS,
      order: { createdAt: 'DESC', id: 'DESC' },
      skip: offset,
      take: PAGE_SIZE + 1,
    });
    return toCursorPage(rows, offset, PAGE_SIZE);
  }

  async get(project: Project, objectId: string): Promise<ZoomOAuthConnection> {
    const connection = await this.connectionRepo.findOne({
      where: { objectId, zoomOAuthApp: { projectId: project.id } },
      relations: CONNECTION_RELATIONS,
    });
    if (!connection) {
      throw new NotFoundException('Zoom OAuth Connection not found');
    }
    return connection;
  }

  async updateMetadata(
    project: Project,
    objectId: string,
    metadata: Record<string, unknown>,
  ): Promise<ZoomOAuthConnection> {
    const connection = await this.get(project, objectId);
    await this.connectionRepo.update(connection.id, { metadata });
    return this.get(project, objectId);
  }

  async delete(project: Project, objectId: string): Promise<ZoomOAuthConnection> {
    const connection = await this.get(project, objectId);
    const { id } = connection;
    await this.mappingRepo.delete({ zoomOAuthConnectionId: id });
    await this.connectionRepo.remove(connection);
    this.logger.log(`connection:deleted id=${objectId}`);
    // remove() clears the primary key on the instance
    connection.id = id;
    return connection;
  }

  findById(id: string): Promise<ZoomOAuthConnection | null> {
    return this.connectionRepo.findOne({ where: { id }, relations: CONNECTION_RELATIONS });
  }

  findByUserId(app: ZoomOAuthApp, userId: string): Promise<ZoomOAuthConnection | null> {
    return this.connectionRepo.findOne({ where: { zoomOAuthAppId: app.id, userId }, relations: CONNECTION_RELATIONS });
  }

  findDisconnectedForApp(zoomOAuthAppId: string): Promise<ZoomOAuthConnection[]> {
    return this.connectionRepo.find({
      where: { zoomOAuthAppId, state: 'disconnected' },
      relations: CONNECTION_RELATIONS,
    });
  }

  /** Connected connections never attempted, or not attempted within the interval. */
  findConnectionsDueForSync(now: Date, intervalMinutes: number): Promise<ZoomOAuthConnection[]> {
    const cutoff = new Date(now.getTime() - intervalMinutes * 60 * 1000);
    return this.connectionRepo.find({
      where: [
        { state: 'connected', lastAttemptedSyncAt: IsNull() },
        { state: 'connected', lastAttemptedSyncAt: LessThan(cutoff) },
      ],
      relations: CONNECTION_RELATIONS,
    });
  }

  countForApp(zoomOAuthAppId: string): Promise<number> {
    return this.connectionRepo.count({ where: { zoomOAuthAppId } });
  }

  /**
   * Trades the stored refresh token for an access token. Zoom rotates refresh
   * tokens, so a new one replaces the stored one.
   */
  async getAccessToken(connection: ZoomOAuthConnection): Promise<string> {
    const credentials = this.readCredentials(connection);
    if (!credentials) {
      throw new ZoomApiAuthenticationError('No credentials found for zoom oauth connection');
    }

    const app = connection.zoomOAuthApp;
    const { client_secret: clientSecret } = readZoomOAuthAppCredentials(this.cipher, app);
    const refreshToken = credentials.refresh_token;
    if (!refreshToken || !app.clientId || !clientSecret) {
      throw new ZoomApiAuthenticationError('Missing refresh_token or client_secret');
    }

    const tokens = await this.zoomApi.refreshAccessToken({ clientId: app.clientId, clientSecret, refreshToken });
    if (!tokens.access_token) {
      throw new ZoomApiError(`No access_token in refresh response. Response body: ${JSON.stringify(tokens)}`);
    }

    if (tokens.refresh_token && tokens.refresh_token !== refreshToken) {
      connection.encryptedCredentials = this.cipher.encryptJson({ ...credentials, refresh_token: tokens.refresh_token });
      await this.connectionRepo.update(connection.id, { encryptedCredentials: connection.encryptedCredentials });
      this.logger.log(`connection:refresh-token-rotated id=${connection.objectId}`);
    }

    return tokens.access_token;
  }

  /**
   * Points every meeting id at this connection. Null and empty ids are skipped;
   * mappings already owned by the connection are left as they are.
   */
  async upsertMeetingMappings(
    meetingIds: ReadonlyArray<string | number | null | undefined>,
    connection: ZoomOAuthConnection,
  ): Promise<MeetingMappingUpsertResult> {
    const ids = [
      ...new Set(
        meetingIds
          .filter((id): id is string | number => id !== null && id !== undefined && id !== '')
          .map((id) => String(id)),
      ),
    ];
    const result: MeetingMappingUpsertResult = { created: 0, updated: 0 };
    if (ids.length === 0) return result;

    const existing = await this.mappingRepo.find({
      where: { zoomOAuthAppId: connection.zoomOAuthAppId, meetingId: In(ids) },
    });
    const byMeetingId = new Map(existing.map((mapping) => [mapping.meetingId, mapping]));

    for (const meetingId of ids) {
      const mapping = byMeetingId.get(meetingId);
      if (!mapping) {
        await this.mappingRepo.save(
          this.mappingRepo.create({
            zoomOAuthAppId: connection.zoomOAuthAppId,
            zoomOAuthConnectionId: connection.id,
            meetingId,
          }),
        );
        result.created++;
      } else if (mapping.zoomOAuthConnectionId !== connection.id) {
        mapping.zoomOAuthConnectionId = connection.id;
        await this.mappingRepo.save(mapping);
        result.updated++;
      }
    }

    this.logger.log(
      `connection:mappings id=${connection.objectId} created=${result.created} updated=${result.updated} total=${ids.length}`,
    );
    return result;
  }

  async handleAuthenticationError(connection: ZoomOAuthConnection, error: Error): Promise<void> {
    const stateChanged = connection.state !== 'disconnected';
    const written = await this.writeSyncState(connection, {
      state: 'disconnected',
      connectionFailureData: { error: error.message, timestamp: new Date().toISOString() },
    });
    if (!written) return;
    this.logger.warn(`connection:disconnected id=${connection.objectId} err=${error.message}`);

    if (stateChanged) await this.emitStateChange(connection);
  }

  async markConnected(connection: ZoomOAuthConnection): Promise<void> {
    const stateChanged = connection.state !== 'connected';
    const written = await this.writeSyncState(connection, { state: 'connected', connectionFailureData: null });

    if (written && stateChanged) {
      this.logger.log(`connection:reconnected id=${connection.objectId}`);
      await this.emitStateChange(connection);
    }
  }

  async recordSuccessfulSync(connection: ZoomOAuthConnection, startedAt: Date, completedAt: Date): Promise<void> {
    const stateChanged = connection.state !== 'connected';
    const written = await this.writeSyncState(connection, {
      state: 'connected',
      connectionFailureData: null,
      lastSuccessfulSyncStartedAt: startedAt,
      lastSuccessfulSyncAt: completedAt,
      lastAttemptedSyncAt: completedAt,
    });

    if (written && stateChanged) await this.emitStateChange(connection);
  }

  async recordAttemptedSync(connection: ZoomOAuthConnection, attemptedAt: Date): Promise<void> {
    await this.writeSyncState(connection, { lastAttemptedSyncAt: attemptedAt });
  }

  /** Zoom reported that the user removed the app. */
  async disconnectDeauthorizedUser(app: ZoomOAuthApp, userId: string): Promise<ZoomOAuthConnection | null> {
    const connection = await this.findByUserId(app, userId);
    if (!connection) {
      this.logger.warn(`connection:deauthorized-unknown app=${app.objectId} user=${userId}`);
      return null;
    }
    await this.handleAuthenticationError(connection, new Error('The Zoom user deauthorized the Zoom OAuth App'));
    return connection;
  }

  /** Maps a newly created meeting to the connection of its host, when there is one. */
  async mapMeetingToHost(app: ZoomOAuthApp, meetingId: string, hostId: string): Promise<boolean> {
    const connection = await this.findByUserId(app, hostId);
    if (!connection) return false;
    await this.upsertMeetingMappings([meetingId], connection);
    return true;
  }

  private async emitStateChange(connection: ZoomOAuthConnection): Promise<void> {
    await this.webhooksService.trigger({
      triggerType: WEBHOOK_TRIGGER_ZOOM_OAUTH_CONNECTION_STATE_CHANGE,
      projectId: connection.zoomOAuthApp.projectId,
      zoomOAuthConnectionId: connection.id,
      payload: serializeZoomOAuthConnection(connection),
    });
  }

  /** Writes only the given columns; false when the row no longer exists. */
  private async writeSyncState(connection: ZoomOAuthConnection, changes: ZoomOAuthConnectionSyncState): Promise<boolean> {
    const result = await this.connectionRepo.update(connection.id, changes);
    if (!result.affected) {
      this.logger.warn(`connection:gone id=${connection.objectId}`);
      return false;
    }
    Object.assign(connection, changes);
    return true;
  }

  private readCredentials(connection: ZoomOAuthConnection): ZoomOAuthConnectionCredentials | null {
    if (!connection.encryptedCredentials) return null;
    const stored = this.cipher.decryptJson(connection.encryptedCredentials);
    if (!isRecord(stored)) return null;
    return { refresh_token: readString(stored, 'refresh_token') };
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
