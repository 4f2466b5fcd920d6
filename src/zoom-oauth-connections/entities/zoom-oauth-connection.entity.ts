import {
  BeforeInsert,
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { generateObjectId } from '../../common/object-id';
import { ZoomOAuthApp } from '../../zoom-oauth-apps/entities/zoom-oauth-app.entity';

export type ZoomOAuthConnectionState = 'connected' | 'disconnected';

export interface ZoomOAuthConnectionFailureData {
  error: string;
  timestamp: string;
}

@Entity('zoom_oauth_connections')
@Unique('unique_zoom_oauth_connection_user_id', ['zoomOAuthAppId', 'userId'])
export class ZoomOAuthConnection {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  objectId!: string;

  @Column({ type: 'uuid' })
  zoomOAuthAppId!: string;

  @ManyToOne(() => ZoomOAuthApp, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'zoomOAuthAppId' })
  zoomOAuthApp!: ZoomOAuthApp;

  @Column()
  userId!: string;

  @Column()
  accountId!: string;

  @Column({ type: 'varchar', default: 'connected' })
  state!: ZoomOAuthConnectionState;

  @Column({ type: 'simple-json', nullable: true })
  metadata!: Record<string, unknown> | null;

  // { refresh_token }, encrypted with CredentialsCipher
  @Column({ type: 'text', nullable: true })
  encryptedCredentials!: string | null;

  @Column({ type: 'simple-json', nullable: true })
  connectionFailureData!: ZoomOAuthConnectionFailureData | null;

  @Column({ type: Date, nullable: true })
  lastAttemptedSyncAt!: Date | null;

  @Column({ type: Date, nullable: true })
  lastSuccessfulSyncAt!: Date | null;

  @Column({ type: Date, nullable: true })
  lastSuccessfulSyncStartedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @BeforeInsert()
  assignObjectId() {
    if (!this.objectId) this.objectId = generateObjectId('zoc');
  }
}
