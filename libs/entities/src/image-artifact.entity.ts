import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

@Entity('image_artifacts')
@Index(['zip', 'format'], { unique: true })
export class ImageArtifact {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  /** `{zip}/{format}{ext}` */
  @Index({ unique: true })
  @Column({ type: 'varchar', length: 64 })
  key!: string;

  @Column({ type: 'varchar', length: 5 })
  zip!: string;

  @Column({ type: 'varchar', length: 32 })
  format!: string;

  @Column({ type: 'varchar', length: 32 })
  contentType!: string;

  @Column({ type: 'bytea' })
  data!: Buffer;

  @Column({ type: 'int' })
  byteSize!: number;

  @Column({ type: 'double precision' })
  lat!: number;

  @Column({ type: 'double precision' })
  lon!: number;

  @Column({ type: 'timestamptz' })
  generatedAt!: Date;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
