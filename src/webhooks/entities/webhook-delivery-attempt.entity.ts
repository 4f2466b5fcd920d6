import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { ZoomOAuthConnection } from '../../zoom-oauth-connections/entities/zoom-oauth-connection.entity';
import { WebhookTriggerType } from '../webhook-trigger-types';
import { WebhookSubscription } from './webhook-subscription.entity';

export type WebhookDeliveryStatus = 'pending' | 'success' | 'failure';

export interface WebhookDeliveryResponse {
  status?: number;
  body?: string;
  error?: string;
}

@Entity('webhook_delivery_attempts')
export class WebhookDeliveryAttempt {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', unique: true })
  idempotencyKey!: string;

  @Column({ type: 'uuid' })
  webhookSubscriptionId!: string;

  @ManyToOne(() => WebhookSubscription, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'webhookSubscriptionId' })
  webhookSubscription!: WebhookSubscription;

  @Column({ type: 'varchar' })
  webhookTriggerType!: WebhookTriggerType;

  @Column({ type: 'uuid', nullable: true })
  zoomOAuthConnectionId!: string | null;

  @ManyToOne(() => ZoomOAuthConnection, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'zoomOAuthConnectionId' })
  zoomOAuthConnection!: ZoomOAuthConnection | null;

  @Column({ type: 'simple-json' })
  payload!: Record<string, unknown>;

  @Column({ type: 'varchar', default: 'pending' })
  status!: WebhookDeliveryStatus;

  @Column({ type: 'int', default: 0 })
  attemptCount!: number;

  @Column({ type: Date, nullable: true })
  lastAttemptAt!: Date | null;

  @Column({ type: Date, nullable: true })
  succeededAt!: Date | null;

  @Column({ type: 'simple-json', nullable: true })
  lastResponse!: WebhookDeliveryResponse | null;

  @CreateDateColumn()
  createdAt!: Date;
}
