import { ConfigModule, ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { DataSource } from 'typeorm';
import { CredentialsCipher } from '../src/credentials/credentials-cipher.service';
import { ApiKeysService } from '../src/projects/api-keys.service';
import { Project } from '../src/projects/entities/project.entity';
import { TaskQueueService } from '../src/task-queue/task-queue.service';
import { WEBHOOK_HTTP_CLIENT } from '../src/webhooks/webhooks.service';
import { ZoomApiClient } from '../src/zoom/zoom-api.client';
import {
  ExchangeAuthorizationCodeParams,
  RefreshAccessTokenParams,
  ZoomMeeting,
  ZoomTokenResponse,
  ZoomUser,
} from '../src/zoom/zoom-api.types';
import { ZoomOAuthApp } from '../src/zoom-oauth-apps/entities/zoom-oauth-app.entity';
import { writeZoomOAuthAppCredentials } from '../src/zoom-oauth-apps/zoom-oauth-app-credentials';
import { ZoomOAuthAppsModule } from '../src/zoom-oauth-apps/zoom-oauth-apps.module';
import {
  ZoomOAuthConnection,
  ZoomOAuthConnectionFailureData,
  ZoomOAuthConnectionState,
} from '../src/zoom-oauth-connections/entities/zoom-oauth-connection.entity';

export const TEST_CONFIG = {
  CREDENTIALS_ENCRYPTION_KEY: 'test-secret',
  TASK_INITIAL_BACKOFF_MS: '0',
  TASK_MAX_BACKOFF_MS: '0',
  ZOOM_OAUTH_SYNC_INTERVAL_MINUTES: '30',
};

export function createZoomApiMock() {
  return {
    refreshAccessToken: jest.fn<Promise<ZoomTokenResponse>, [RefreshAccessTokenParams]>(),
    exchangeAuthorizationCode: jest.fn<Promise<ZoomTokenResponse>, [ExchangeAuthorizationCodeParams]>(),
    getCurrentUser: jest.fn<Promise<ZoomUser>, [string]>(),
    getPersonalMeetingId: jest.fn<Promise<string | null>, [string]>(),
    listMeetings: jest.fn<Promise<ZoomMeeting[]>, [string]>(),
    clientCredentialsAreValid: jest.fn<Promise<boolean>, [string, string]>(),
  };
}

export type ZoomApiMock = ReturnType<typeof createZoomApiMock>;

/** Stands in for subscriber endpoints: records every request and answers with a fixed status. */
export interface FakeWebhookEndpoint {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
  respondWith(status: number): void;
}

export function createFakeWebhookEndpoint(): FakeWebhookEndpoint {
  const requests: InternalAxiosRequestConfig[] = [];
  let status = 200;

  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const response: AxiosResponse = { data: 'ok', status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response,
        );
      }
      return response;
    },
  });

  return {
    http,
    requests,
    respondWith: (next) => {
      status = next;
    },
  };
}

export interface TestContext {
  moduleRef: TestingModule;
  dataSource: DataSource;
  zoomApi: ZoomApiMock;
  webhookEndpoint: FakeWebhookEndpoint;
  taskQueue: TaskQueueService;
}

/** Every feature module on an in-memory SQLite database, with Zoom and subscriber HTTP faked. */
export async function createTestContext(): Promise<TestContext> {
  const zoomApi = createZoomApiMock();
  const webhookEndpoint = createFakeWebhookEndpoint();

  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
      TypeOrmModule.forRoot({
        type: 'better-sqlite3',
        database: ':memory:',
        autoLoadEntities: true,
        synchronize: true,
      }),
      ZoomOAuthAppsModule,
    ],
  })
    .overrideProvider(ConfigService)
    .useValue(new ConfigService(TEST_CONFIG))
    .overrideProvider(ZoomApiClient)
    .useValue(zoomApi)
    .overrideProvider(WEBHOOK_HTTP_CLIENT)
    .useValue(webhookEndpoint.http)
    .compile();

  return {
    moduleRef,
    dataSource: moduleRef.get(DataSource),
    zoomApi,
    webhookEndpoint,
    taskQueue: moduleRef.get(TaskQueueService),
  };
}

export async function closeTestContext(ctx: TestContext): Promise<void> {
  await ctx.taskQueue.drain();
  await ctx.moduleRef.close();
}

export async function seedProject(ctx: TestContext, name = 'Test project'): Promise<{ project: Project; apiKey: string }> {
  const repo = ctx.dataSource.getRepository(Project);
  const project = await repo.save(repo.create({ name }));
  const { plainKey } = await ctx.moduleRef.get(ApiKeysService).create(project, 'test key');
  return { project, apiKey: plainKey };
}

export interface SeedZoomOAuthAppOptions {
  clientId?: string;
  clientSecret?: string;
  webhookSecret?: string;
}

export async function seedZoomOAuthApp(
  ctx: TestContext,
  project: Project,
  options: SeedZoomOAuthAppOptions = {},
): Promise<ZoomOAuthApp> {
  const repo = ctx.dataSource.getRepository(ZoomOAuthApp);
  const app = repo.create({ projectId: project.id, clientId: options.clientId ?? 'test-client-id' });
  writeZoomOAuthAppCredentials(ctx.moduleRef.get(CredentialsCipher), app, {
    client_secret: options.clientSecret ?? 'test-client-secret',
    webhook_secret: options.webhookSecret ?? 'test-webhook-secret',
  });
  return repo.save(app);
}

export interface SeedConnectionOptions {
  userId?: string;
  accountId?: string;
  state?: ZoomOAuthConnectionState;
  connectionFailureData?: ZoomOAuthConnectionFailureData | null;
  metadata?: Record<string, unknown> | null;
  /** `null` stores no credentials at all. */
  refreshToken?: string | null;
}

export async function seedConnection(
  ctx: TestContext,
  app: ZoomOAuthApp,
  options: SeedConnectionOptions = {},
): Promise<ZoomOAuthConnection> {
  const repo = ctx.dataSource.getRepository(ZoomOAuthConnection);
  const refreshToken = options.refreshToken === undefined ? 'test-refresh-token' : options.refreshToken;
  const connection = await repo.save(
    repo.create({
      zoomOAuthAppId: app.id,
      userId: options.userId ?? 'zoom-user-1',
      accountId: options.accountId ?? 'zoom-account-1',
      state: options.state ?? 'connected',
      metadata: options.metadata ?? null,
      connectionFailureData: options.connectionFailureData ?? null,
      encryptedCredentials:
        refreshToken === null
          ? null
          : ctx.moduleRef.get(CredentialsCipher).encryptJson({ refresh_token: refreshToken }),
    }),
  );
  connection.zoomOAuthApp = app;
  return connection;
}

export async function reloadConnection(ctx: TestContext, id: string): Promise<ZoomOAuthConnection> {
  return ctx.dataSource
    .getRepository(ZoomOAuthConnection)
    .findOneOrFail({ where: { id }, relations: { zoomOAuthApp: true } });
}
