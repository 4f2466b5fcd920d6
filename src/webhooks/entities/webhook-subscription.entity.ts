import {
  BeforeInsert,
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { generateObjectId } from '../../common/object-id';
import { Project } from '../../projects/entities/project.entity';
import { WebhookTriggerType } from '../webhook-trigger-types';

@Entity('webhook_subscriptions')
export class WebhookSubscription {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  objectId!: string;

  @Column({ type: 'uuid' })
  projectId!: string;

  @ManyToOne(() => Project, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'projectId' })
  project!: Project;

  @Column()
  url!: string;

  @Column({ type: 'simple-json' })
  triggers!: WebhookTriggerType[];

  @Column({ default: true })
  isActive!: boolean;

  // Signing secret, encrypted with CredentialsCipher
  @Column({ type: 'text' })
  encryptedSecret!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @BeforeInsert()
  assignObjectId() {
    if (!this.objectId) this.objectId = generateObjectId('webhook');
  }
}
