import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { isRecord, readString } from '../common/is-record';
import { CredentialsCipher } from '../credentials/credentials-cipher.service';
import { Project } from '../projects/entities/project.entity';
import { ZoomApiClient } from '../zoom/zoom-api.client';
import { ValidateZoomOAuthConnectionsTask } from '../zoom-oauth-connections/tasks/validate-zoom-oauth-connections.task';
import { ZoomOAuthConnectionsService } from '../zoom-oauth-connections/zoom-oauth-connections.service';
import { CreateOrUpdateZoomOAuthAppDto } from './dto/create-or-update-zoom-oauth-app.dto';
import { ZoomOAuthApp } from './entities/zoom-oauth-app.entity';
import { readZoomOAuthAppCredentials, writeZoomOAuthAppCredentials } from './zoom-oauth-app-credentials';
import { isValidZoomWebhookSignature, zoomUrlValidationToken } from './zoom-webhook-signature';

export interface ZoomWebhookHeaders {
  timestamp?: string;
  signature?: string;
}

export type ZoomWebhookResult = { plainToken: string; encryptedToken: string } | { status: 'ok' | 'ignored' };

@Injectable()
export class ZoomOAuthAppsService {
  private readonly logger = new Logger(ZoomOAuthAppsService.name);

  constructor(
    @InjectRepository(ZoomOAuthApp)
    private readonly appRepo: Repository<ZoomOAuthApp>,
    private readonly cipher: CredentialsCipher,
    private readonly zoomApi: ZoomApiClient,
    private readonly connectionsService: ZoomOAuthConnectionsService,
    private readonly validateTask: ValidateZoomOAuthConnectionsTask,
  ) {}

  /**
   * A project has at most one app. Creating it requires a client id and secret
   * that Zoom accepts; updating it only replaces the secrets that are provided.
   */
  async createOrUpdate(
    project: Project,
    dto: CreateOrUpdateZoomOAuthAppDto,
  ): Promise<{ app: ZoomOAuthApp; created: boolean }> {
    const clientId = (dto.client_id ?? '').trim();
    const clientSecret = (dto.client_secret ?? '').trim();
    const webhookSecret = (dto.webhook_secret ?? '').trim();

    const existing = await this.appRepo.findOne({ where: { projectId: project.id } });

    if (!existing) {
      if (!clientId || !clientSecret) {
        throw new BadRequestException('client_id and client_secret are required when creating a new Zoom OAuth app');
      }
      if (!(await this.clientCredentialsAreValid(clientId, clientSecret))) {
        throw new BadRequestException('Invalid client id or client secret');
      }

      const app = this.appRepo.create({ projectId: project.id, clientId });
      writeZoomOAuthAppCredentials(this.cipher, app, { client_secret: clientSecret, webhook_secret: webhookSecret });
      const saved = await this.appRepo.save(app);
      this.logger.log(`app:created id=${saved.objectId} project=${project.objectId}`);
      return { app: saved, created: true };
    }

    const stored = readZoomOAuthAppCredentials(this.cipher, existing);
    if (clientSecret && !(await this.clientCredentialsAreValid(existing.clientId, clientSecret))) {
      throw new BadRequestException('Invalid client secret');
    }
    const clientSecretChanged = clientSecret !== '' && clientSecret !== stored.client_secret;

    writeZoomOAuthAppCredentials(this.cipher, existing, {
      client_secret: clientSecret || stored.client_secret || '',
      webhook_secret: webhookSecret || stored.webhook_secret || '',
    });
    const saved = await this.appRepo.save(existing);

    // Connections broken by the previous secret may work again
    if (clientSecretChanged) {
      this.logger.log(`app:client-secret-changed id=${saved.objectId}`);
      this.validateTask.enqueue(saved.id);
    }
    return { app: saved, created: false };
  }

  list(project: Project): Promise<ZoomOAuthApp[]> {
    return this.appRepo.find({ where: { projectId: project.id }, order: { createdAt: 'ASC' } });
  }

  async delete(project: Project, objectId: string): Promise<void> {
    const app = await this.appRepo.findOne({ where: { projectId: project.id, objectId } });
    if (!app) {
      throw new NotFoundException('Zoom OAuth App not found');
    }

    const connections = await this.connectionsService.countForApp(app.id);
    if (connections > 0) {
      throw new ConflictException(
        `Zoom OAuth App ${objectId} still has ${connections} connection(s). Delete them before deleting the app.`,
      );
    }

    await this.appRepo.remove(app);
    this.logger.log(`app:deleted id=${objectId}`);
  }

  async handleZoomWebhook(
    objectId: string,
    body: unknown,
    rawBody: string,
    headers: ZoomWebhookHeaders,
  ): Promise<ZoomWebhookResult> {
    const app = await this.appRepo.findOne({ where: { objectId } });
    if (!app) {
      throw new NotFoundException('Zoom OAuth App not found');
    }
    const { webhook_secret: secret } = readZoomOAuthAppCredentials(this.cipher, app);
    if (!secret) {
      throw new BadRequestException('Zoom OAuth App has no webhook secret');
    }

    const event = isRecord(body) ? readString(body, 'event') : undefined;
    const payload: Record<string, unknown> = isRecord(body) && isRecord(body.payload) ? body.payload : {};
    this.logger.log(`zoom-webhook:received app=${app.objectId} event=${event ?? 'none'}`);

    // The handshake is answered before any signature check
    if (event === 'endpoint.url_validation') {
      const plainToken = readString(payload, 'plainToken');
      if (!plainToken) {
        throw new BadRequestException('URL validation without plainToken');
      }
      return { plainToken, encryptedToken: zoomUrlValidationToken(secret, plainToken) };
    }

    if (!isValidZoomWebhookSignature(secret, headers.timestamp, rawBody, headers.signature)) {
      this.logger.warn(`zoom-webhook:invalid-signature app=${app.objectId}`);
      throw new UnauthorizedException('Invalid Zoom webhook signature');
    }

    switch (event) {
      case 'app_deauthorized': {
        const userId = readString(payload, 'user_id');
        if (!userId) return { status: 'ignored' };
        const connection = await this.connectionsService.disconnectDeauthorizedUser(app, userId);
        return { status: connection ? 'ok' : 'ignored' };
      }
      case 'meeting.created': {
        const meeting: Record<string, unknown> = isRecord(payload.object) ? payload.object : {};
        const meetingId = readMeetingId(meeting.id);
        const hostId = readString(meeting, 'host_id');
        if (!meetingId || !hostId) return { status: 'ignored' };
        const mapped = await this.connectionsService.mapMeetingToHost(app, meetingId, hostId);
        return { status: mapped ? 'ok' : 'ignored' };
      }
      default:
        return { status: 'ignored' };
    }
  }

  private async clientCredentialsAreValid(clientId: string, clientSecret: string): Promise<boolean> {
    try {
      return await this.zoomApi.clientCredentialsAreValid(clientId, clientSecret);
    } catch (error) {
      throw new BadGatewayException(
        `Could not validate the client credentials with Zoom: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

function readMeetingId(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value !== '') return value;
  return undefined;
}
