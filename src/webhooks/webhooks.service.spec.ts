import { NotFoundException } from '@nestjs/common';
import {
  closeTestContext,
  createTestContext,
  seedConnection,
  seedProject,
  seedZoomOAuthApp,
  TestContext,
} from '../../test/testing-module';
import { Project } from '../projects/entities/project.entity';
import { WebhookDeliveryAttempt } from './entities/webhook-delivery-attempt.entity';
import { WebhookSubscription } from './entities/webhook-subscription.entity';
import { signWebhookBody, WebhooksService } from './webhooks.service';

describe('WebhooksService', () => {
  let ctx: TestContext;
  let service: WebhooksService;
  let project: Project;

  beforeEach(async () => {
    ctx = await createTestContext();
    service = ctx.moduleRef.get(WebhooksService);
    ({ project } = await seedProject(ctx));
  });

  afterEach(async () => {
    await closeTestContext(ctx);
  });

  const subscribe = (p: Project, url = 'https://hooks.test/zoom') =>
    service.createSubscription(p, { url, triggers: ['zoom_oauth_connection.state_change'] });

  const attempts = () => ctx.dataSource.getRepository(WebhookDeliveryAttempt).find();

  it('returns the signing secret once and stores it encrypted', async () => {
    const { subscription, secret } = await subscribe(project);

    expect(subscription.objectId).toMatch(/^webhook_/);
    expect(secret).toMatch(/^[0-9a-f]{64}$/);
    const stored = await ctx.dataSource
      .getRepository(WebhookSubscription)
      .findOneByOrFail({ id: subscription.id });
    expect(stored.encryptedSecret).not.toContain(secret);
  });

  it('delivers a signed payload to every active subscriber of the project', async () => {
    const { secret } = await subscribe(project);
    const inactive = await subscribe(project, 'https://hooks.test/inactive');
    await ctx.dataSource.getRepository(WebhookSubscription).update(inactive.subscription.id, { isActive: false });
    const { project: other } = await seedProject(ctx, 'Other project');
    await subscribe(other, 'https://hooks.test/other');

    const app = await seedZoomOAuthApp(ctx, project);
    const connection = await seedConnection(ctx, app);

    const created = await service.trigger({
      triggerType: 'zoom_oauth_connection.state_change',
      projectId: project.id,
      zoomOAuthConnectionId: connection.id,
      payload: { id: connection.objectId, state: 'disconnected' },
    });
    await ctx.taskQueue.drain();

    expect(created).toHaveLength(1);
    expect(ctx.webhookEndpoint.requests).toHaveLength(1);

    const [request] = ctx.webhookEndpoint.requests;
    const body = String(request.data);
    expect(request.url).toBe('https://hooks.test/zoom');
    expect(request.headers.get('X-Webhook-Signature')).toBe(signWebhookBody(body, secret));
    expect(JSON.parse(body)).toEqual({
      idempotency_key: created[0].idempotencyKey,
      trigger: 'zoom_oauth_connection.state_change',
      data: { id: connection.objectId, state: 'disconnected' },
    });

    const [attempt] = await attempts();
    expect(attempt.status).toBe('success');
    expect(attempt.attemptCount).toBe(1);
    expect(attempt.zoomOAuthConnectionId).toBe(connection.id);
    expect(attempt.succeededAt).not.toBeNull();
    expect(attempt.lastResponse).toEqual({ status: 200, body: 'ok' });
  });

  it('retries a failing endpoint three times and records the failure', async () => {
    await subscribe(project);
    ctx.webhookEndpoint.respondWith(500);

    await service.trigger({
      triggerType: 'zoom_oauth_connection.state_change',
      projectId: project.id,
      payload: { id: 'zoc_test' },
    });
    await ctx.taskQueue.drain();

    expect(ctx.webhookEndpoint.requests).toHaveLength(4);
    const [attempt] = await attempts();
    expect(attempt.status).toBe('failure');
    expect(attempt.attemptCount).toBe(4);
    expect(attempt.succeededAt).toBeNull();
    expect(attempt.lastResponse).toEqual({ status: 500, body: 'ok' });
  });

  it('creates no attempt without subscribers', async () => {
    const created = await service.trigger({
      triggerType: 'zoom_oauth_connection.state_change',
      projectId: project.id,
      payload: {},
    });

    expect(created).toEqual([]);
    expect(await attempts()).toEqual([]);
  });

  it('lists and deletes subscriptions within the project', async () => {
    const { subscription } = await subscribe(project);
    const { project: other } = await seedProject(ctx, 'Other project');

    expect((await service.listSubscriptions(other)).map((s) => s.id)).toEqual([]);
    await expect(service.deleteSubscription(other, subscription.objectId)).rejects.toBeInstanceOf(NotFoundException);

    await service.deleteSubscription(project, subscription.objectId);
    expect(await service.listSubscriptions(project)).toEqual([]);
  });
});
