/**
 * Session transcript persistence.
 *
 * One document per (tenant, instance, session); messages are appended with a
 * JSONB concatenation so concurrent turns on the same session never
 * overwrite each other.
 */
import type { Repository } from 'typeorm';
import { TeamSession } from '../entities/TeamSession';
import type { HierarchyKey } from '../types/hierarchy';
import type { SessionSummary, SessionTranscript, TranscriptMessage } from '../types/session';

export interface TranscriptStore {
  append(key: HierarchyKey, sessionId: string, messages: TranscriptMessage[]): Promise<void>;
  find(key: HierarchyKey, sessionId: string): Promise<SessionTranscript | null>;
  list(key: HierarchyKey): Promise<SessionSummary[]>;
}

interface SummaryRow {
  sessionId: string;
  messageCount: string | number;
  createdAt: Date;
  updatedAt: Date;
}

export class TypeOrmTranscriptStore implements TranscriptStore {
  constructor(private readonly repository: Repository<TeamSession>) {}

  async append(key: HierarchyKey, sessionId: string, messages: TranscriptMessage[]): Promise<void> {
    if (messages.length === 0) return;

    await this.repository.query(
      `
      INSERT INTO team_sessions (tenant_id, instance_id, session_id, messages)
      VALUES ($1, $2, $3, $4::jsonb)
      ON CONFLICT (tenant_id, instance_id, session_id)
      DO UPDATE SET messages = team_sessions.messages || EXCLUDED.messages, updated_at = NOW()
      `,
      [key.tenantId, key.instanceId, sessionId, JSON.stringify(messages)]
    );
  }

  async find(key: HierarchyKey, sessionId: string): Promise<SessionTranscript | null> {
    const session = await this.repository.findOne({
      where: { tenant_id: key.tenantId, instance_id: key.instanceId, session_id: sessionId },
    });
    if (!session) return null;

    return {
      tenantId: session.tenant_id,
      instanceId: session.instance_id,
      sessionId: session.session_id,
      messageCount: session.messages.length,
      messages: session.messages,
      createdAt: session.created_at,
      updatedAt: session.updated_at,
    };
  }

  async list(key: HierarchyKey): Promise<SessionSummary[]> {
    const rows = await this.repository
      .createQueryBuilder('session')
      .select('session.session_id', 'sessionId')
      .addSelect('jsonb_array_length(session.messages)', 'messageCount')
      .addSelect('session.created_at', 'createdAt')
      .addSelect('session.updated_at', 'updatedAt')
      .where('session.tenant_id = :tenantId', { tenantId: key.tenantId })
      .andWhere('session.instance_id = :instanceId', { instanceId: key.instanceId })
      .orderBy('session.updated_at', 'DESC')
      .getRawMany<SummaryRow>();

    return rows.map((row) => ({
      sessionId: row.sessionId,
      messageCount: Number(row.messageCount),
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    }));
  }
}
