import {
  closeTestContext,
  createTestContext,
  reloadConnection,
  seedConnection,
  seedProject,
  seedZoomOAuthApp,
  TestContext,
} from '../../../test/testing-module';
import { Project } from '../../projects/entities/project.entity';
import { WebhooksService } from '../../webhooks/webhooks.service';
import { ZoomApiAuthenticationError } from '../../zoom/zoom-api.errors';
import { ZoomOAuthApp } from '../../zoom-oauth-apps/entities/zoom-oauth-app.entity';
import { ZoomOAuthConnectionsService } from '../zoom-oauth-connections.service';
import { ValidateZoomOAuthConnectionsTask } from './validate-zoom-oauth-connections.task';

const INVALID_CLIENT = {
  error: 'Failed to refresh Zoom access token. Zoom authentication error: {"reason":"Invalid client_id or client_secret","error":"invalid_client"}',
  timestamp: '2024-01-01T00:00:00.000Z',
};

describe('ValidateZoomOAuthConnectionsTask', () => {
  let ctx: TestContext;
  let task: ValidateZoomOAuthConnectionsTask;
  let project: Project;
  let app: ZoomOAuthApp;

  beforeEach(async () => {
    ctx = await createTestContext();
    task = ctx.moduleRef.get(ValidateZoomOAuthConnectionsTask);
    ({ project } = await seedProject(ctx));
    app = await seedZoomOAuthApp(ctx, project);
    ctx.zoomApi.refreshAccessToken.mockResolvedValue({ access_token: 'test-access-token' });
  });

  afterEach(async () => {
    await closeTestContext(ctx);
  });

  it('reconnects only connections broken by invalid client credentials', async () => {
    await ctx.moduleRef.get(WebhooksService).createSubscription(project, {
      url: 'https://hooks.test/zoom',
      triggers: ['zoom_oauth_connection.state_change'],
    });
    const eligible = await seedConnection(ctx, app, {
      userId: 'zoom-user-1',
      state: 'disconnected',
      connectionFailureData: INVALID_CLIENT,
    });
    const revoked = await seedConnection(ctx, app, {
      userId: 'zoom-user-2',
      state: 'disconnected',
      connectionFailureData: { error: 'Zoom authentication error: {"error":"invalid_grant"}', timestamp: INVALID_CLIENT.timestamp },
    });
    const noReason = await seedConnection(ctx, app, { userId: 'zoom-user-3', state: 'disconnected' });
    const connected = await seedConnection(ctx, app, { userId: 'zoom-user-4' });

    await task.run(app.id);
    await ctx.taskQueue.drain();

    expect(ctx.zoomApi.refreshAccessToken).toHaveBeenCalledTimes(1);

    const reconnected = await reloadConnection(ctx, eligible.id);
    expect(reconnected.state).toBe('connected');
    expect(reconnected.connectionFailureData).toBeNull();
    expect((await reloadConnection(ctx, revoked.id)).state).toBe('disconnected');
    expect((await reloadConnection(ctx, noReason.id)).state).toBe('disconnected');
    expect((await reloadConnection(ctx, connected.id)).state).toBe('connected');

    const bodies = ctx.webhookEndpoint.requests.map((r) => JSON.parse(String(r.data)));
    expect(bodies.map((b) => [b.data.id, b.data.state])).toEqual([[eligible.objectId, 'connected']]);
  });

  it('keeps going when one connection still fails', async () => {
    const failingRefreshToken = 'test-refresh-token-failing';
    const first = await seedConnection(ctx, app, {
      userId: 'zoom-user-1',
      state: 'disconnected',
      connectionFailureData: INVALID_CLIENT,
      refreshToken: failingRefreshToken,
    });
    const second = await seedConnection(ctx, app, {
      userId: 'zoom-user-2',
      state: 'disconnected',
      connectionFailureData: INVALID_CLIENT,
    });
    ctx.zoomApi.refreshAccessToken.mockImplementation(async ({ refreshToken }) => {
      if (refreshToken === failingRefreshToken) throw new ZoomApiAuthenticationError('invalid_grant');
      return { access_token: 'test-access-token' };
    });

    await expect(task.run(app.id)).resolves.toBeUndefined();

    expect((await reloadConnection(ctx, first.id)).state).toBe('disconnected');
    expect((await reloadConnection(ctx, second.id)).state).toBe('connected');
  });

  it('leaves the connection untouched when no access token comes back', async () => {
    const connection = await seedConnection(ctx, app, {
      state: 'disconnected',
      connectionFailureData: INVALID_CLIENT,
    });
    ctx.zoomApi.refreshAccessToken.mockResolvedValue({ access_token: '' });

    await task.run(app.id);

    const stored = await reloadConnection(ctx, connection.id);
    expect(stored.state).toBe('disconnected');
    expect(stored.connectionFailureData).toEqual(INVALID_CLIENT);
  });

  it('is retried once by the queue', async () => {
    const findDisconnected = jest
      .spyOn(ctx.moduleRef.get(ZoomOAuthConnectionsService), 'findDisconnectedForApp')
      .mockRejectedValue(new Error('database unavailable'));

    task.enqueue(app.id);
    await ctx.taskQueue.drain();

    expect(findDisconnected).toHaveBeenCalledTimes(2);
  });
});
