import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import axios, { AxiosInstance } from 'axios';
import { createHmac, randomBytes, randomUUID } from 'crypto';
import { Repository } from 'typeorm';
import { isRecord, readString } from '../common/is-record';
import { CredentialsCipher } from '../credentials/credentials-cipher.service';
import { Project } from '../projects/entities/project.entity';
import { TaskQueueService } from '../task-queue/task-queue.service';
import { CreateWebhookDto } from './dto/create-webhook.dto';
import { WebhookDeliveryAttempt, WebhookDeliveryResponse } from './entities/webhook-delivery-attempt.entity';
import { WebhookSubscription } from './entities/webhook-subscription.entity';
import { WebhookTriggerType } from './webhook-trigger-types';

export const WEBHOOK_HTTP_CLIENT = Symbol('WEBHOOK_HTTP_CLIENT');
export const WEBHOOK_SIGNATURE_HEADER = 'X-Webhook-Signature';

const DELIVERY_MAX_RETRIES = 3;
const RESPONSE_BODY_LIMIT = 1000;

export interface TriggerWebhookParams {
  triggerType: WebhookTriggerType;
  projectId: string;
  zoomOAuthConnectionId?: string | null;
  payload: Record<string, unknown>;
}

export function signWebhookBody(body: string, secret: string): string {
  return createHmac('sha256', secret).update(body).digest('base64');
}

@Injectable()
export class WebhooksService {
  private readonly logger = new Logger(WebhooksService.name);

  constructor(
    @InjectRepository(WebhookSubscription)
    private readonly subscriptionRepo: Repository<WebhookSubscription>,
    @InjectRepository(WebhookDeliveryAttempt)
    private readonly attemptRepo: Repository<WebhookDeliveryAttempt>,
    private readonly cipher: CredentialsCipher,
    private readonly taskQueue: TaskQueueService,
    @Inject(WEBHOOK_HTTP_CLIENT) private readonly http: AxiosInstance,
  ) {}

  /** The signing secret is only ever returned here. */
  async createSubscription(
    project: Project,
    dto: CreateWebhookDto,
  ): Promise<{ subscription: WebhookSubscription; secret: string }> {
    const secret = randomBytes(32).toString('hex');
    const subscription = await this.subscriptionRepo.save(
      this.subscriptionRepo.create({
        projectId: project.id,
        url: dto.url,
        triggers: [...new Set(dto.triggers)],
        isActive: true,
        encryptedSecret: this.cipher.encryptJson({ secret }),
      }),
    );
    this.logger.log(`webhook:created id=${subscription.objectId} project=${project.objectId}`);
    return { subscription, secret };
  }

  listSubscriptions(project: Project): Promise<WebhookSubscription[]> {
    return this.subscriptionRepo.find({ where: { projectId: project.id }, order: { createdAt: 'ASC' } });
  }

  async deleteSubscription(project: Project, objectId: string): Promise<void> {
    const subscription = await this.subscriptionRepo.findOne({ where: { projectId: project.id, objectId } });
    if (!subscription) {
      throw new NotFoundException('Webhook not found');
    }
    await this.subscriptionRepo.remove(subscription);
  }

  /** Creates one delivery attempt per active subscription listening to the trigger and queues it. */
  async trigger(params: TriggerWebhookParams): Promise<WebhookDeliveryAttempt[]> {
    const subscriptions = await this.subscriptionRepo.find({
      where: { projectId: params.projectId, isActive: true },
    });

    const attempts: WebhookDeliveryAttempt[] = [];
    for (const subscription of subscriptions) {
      if (!subscription.triggers.includes(params.triggerType)) continue;

      const attempt = await this.attemptRepo.save(
        this.attemptRepo.create({
          idempotencyKey: randomUUID(),
          webhookSubscriptionId: subscription.id,
          webhookTriggerType: params.triggerType,
          zoomOAuthConnectionId: params.zoomOAuthConnectionId ?? null,
          payload: params.payload,
          status: 'pending',
          attemptCount: 0,
        }),
      );
      attempts.push(attempt);
      this.taskQueue.enqueue(`deliver-webhook:${attempt.idempotencyKey}`, () => this.deliver(attempt.id), {
        maxRetries: DELIVERY_MAX_RETRIES,
      });
    }

    if (attempts.length > 0) {
      this.logger.log(`webhook:triggered trigger=${params.triggerType} deliveries=${attempts.length}`);
    }
    return attempts;
  }

  /** Throws on a failed delivery so the queue retries it. */
  async deliver(attemptId: string): Promise<void> {
    const attempt = await this.attemptRepo.findOne({
      where: { id: attemptId },
      relations: { webhookSubscription: true },
    });
    if (!attempt) {
      this.logger.warn(`webhook:deliver-skip attempt=${attemptId} reason=not-found`);
      return;
    }
    if (attempt.status === 'success') return;

    const subscription = attempt.webhookSubscription;
    const body = JSON.stringify({
      idempotency_key: attempt.idempotencyKey,
      trigger: attempt.webhookTriggerType,
      data: attempt.payload,
    });

    attempt.attemptCount += 1;
    attempt.lastAttemptAt = new Date();

    try {
      const response = await this.http.post<unknown>(subscription.url, body, {
        headers: {
          'Content-Type': 'application/json',
          [WEBHOOK_SIGNATURE_HEADER]: signWebhookBody(body, this.secretOf(subscription)),
        },
      });
      attempt.status = 'success';
      attempt.succeededAt = new Date();
      attempt.lastResponse = { status: response.status, body: this.renderBody(response.data) };
      await this.attemptRepo.save(attempt);
      this.logger.log(`webhook:delivered attempt=${attempt.idempotencyKey} status=${response.status}`);
    } catch (error) {
      attempt.status = 'failure';
      attempt.lastResponse = this.describeFailure(error);
      await this.attemptRepo.save(attempt);
      this.logger.warn(
        `webhook:delivery-failed attempt=${attempt.idempotencyKey} url=${subscription.url} count=${attempt.attemptCount}`,
      );
      throw error;
    }
  }

  private secretOf(subscription: WebhookSubscription): string {
    const stored = this.cipher.decryptJson(subscription.encryptedSecret);
    const secret = isRecord(stored) ? readString(stored, 'secret') : undefined;
    if (!secret) {
      throw new Error(`Webhook ${subscription.objectId} has no signing secret`);
    }
    return secret;
  }

  private describeFailure(error: unknown): WebhookDeliveryResponse {
    if (axios.isAxiosError(error) && error.response) {
      return { status: error.response.status, body: this.renderBody(error.response.data) };
    }
    return { error: error instanceof Error ? error.message : String(error) };
  }

  private renderBody(data: unknown): string {
    const rendered = typeof data === 'string' ? data : JSON.stringify(data ?? null);
    return rendered.slice(0, RESPONSE_BODY_LIMIT);
  }
}
