import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  Unique,
} from 'typeorm';
import type { TranscriptMessage } from '../types/session';

@Entity('team_sessions')
@Unique('UQ_team_sessions_tenant_instance_session', ['tenant_id', 'instance_id', 'session_id'])
export class TeamSession {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  @Index()
  tenant_id!: string;

  @Column({ type: 'varchar', length: 255 })
  instance_id!: string;

  @Column({ type: 'varchar', length: 255 })
  session_id!: string;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  messages!: TranscriptMessage[];

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
