import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { ZoomOAuthApp } from '../../zoom-oauth-apps/entities/zoom-oauth-app.entity';
import { ZoomOAuthConnection } from './zoom-oauth-connection.entity';

/** Which connection last reported access to a Zoom meeting. */
@Entity('zoom_meeting_to_zoom_oauth_connection_mappings')
@Unique('unique_zoom_meeting_mapping_meeting_id', ['zoomOAuthAppId', 'meetingId'])
export class ZoomMeetingToZoomOAuthConnectionMapping {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  zoomOAuthAppId!: string;

  @ManyToOne(() => ZoomOAuthApp, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'zoomOAuthAppId' })
  zoomOAuthApp!: ZoomOAuthApp;

  @Column({ type: 'uuid' })
  zoomOAuthConnectionId!: string;

  @ManyToOne(() => ZoomOAuthConnection, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'zoomOAuthConnectionId' })
  zoomOAuthConnection!: ZoomOAuthConnection;

  @Column()
  meetingId!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
