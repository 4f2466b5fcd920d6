import { BeforeInsert, Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { generateObjectId } from '../../common/object-id';

@Entity('projects')
export class Project {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  objectId!: string;

  @Column()
  name!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @BeforeInsert()
  assignObjectId() {
    if (!this.objectId) this.objectId = generateObjectId('proj');
  }
}
