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

@Entity('zoom_oauth_apps')
export class ZoomOAuthApp {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  objectId!: string;

  @Column({ type: 'uuid', unique: true })
  projectId!: string;

  @ManyToOne(() => Project, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'projectId' })
  project!: Project;

  @Column()
  clientId!: string;

  // { client_secret, webhook_secret }, encrypted with CredentialsCipher
  @Column({ type: 'text', nullable: true })
  encryptedCredentials!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @BeforeInsert()
  assignObjectId() {
    if (!this.objectId) this.objectId = generateObjectId('zoa');
  }
}
