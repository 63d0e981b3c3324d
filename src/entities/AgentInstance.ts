import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  Unique,
} from 'typeorm';
import type { AgentSpec } from '../types/hierarchy';

/**
 * One tenant instance's team hierarchy.
 *
 * Agents are stored as a JSONB document: the whole list is replaced on
 * update, so there is nothing to gain from a child table.
 */
@Entity('agent_instances')
@Unique('UQ_agent_instances_tenant_instance', ['tenant_id', 'instance_id'])
export class AgentInstance {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  @Index()
  tenant_id!: string;

  @Column({ type: 'varchar', length: 255 })
  instance_id!: string;

  @Column({ type: 'text' })
  delegator_instructions!: string;

  @Column({ type: 'jsonb', default: () => "'[]'" })
  agents!: AgentSpec[];

  // Timestamps are owned by the merge logic, not by the ORM
  @Column({ type: 'timestamptz' })
  created_at!: Date;

  @Column({ type: 'timestamptz' })
  updated_at!: Date;
}
