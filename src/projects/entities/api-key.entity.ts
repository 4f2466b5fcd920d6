import { BeforeInsert, Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { generateObjectId } from '../../common/object-id';
import { Project } from './project.entity';

@Entity('api_keys')
export class ApiKey {
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
  name!: string;

  // SHA-256 of the plain key, hex
  @Column({ unique: true })
  keyHash!: string;

  @Column({ default: false })
  disabled!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @BeforeInsert()
  assignObjectId() {
    if (!this.objectId) this.objectId = generateObjectId('key');
  }
}
