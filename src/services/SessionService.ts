import { logger } from '../config';
import { NotFoundError, StorageError, errorMessage } from '../errors';
import type { TranscriptStore } from '../stores/TranscriptStore';
import type { HierarchyKey } from '../types/hierarchy';
import type { SessionSummary, SessionTranscript, TranscriptMessage } from '../types/session';

/**
 * Conversation transcripts per (tenant, instance, session).
 */
export class SessionService {
  constructor(private readonly store: TranscriptStore) {}

  async appendMessages(key: HierarchyKey, sessionId: string, messages: TranscriptMessage[]): Promise<void> {
    if (messages.length === 0) return;
    await this.storage('append', () => this.store.append(key, sessionId, messages));
    logger.debug({ ...key, sessionId, count: messages.length }, 'Appended session messages');
  }

  async getMessages(key: HierarchyKey, sessionId: string): Promise<TranscriptMessage[]> {
    const transcript = await this.storage('load', () => this.store.find(key, sessionId));
    return transcript?.messages ?? [];
  }

  async listSessions(tenantId: string, instanceId: string): Promise<SessionSummary[]> {
    return this.storage('list', () => this.store.list({ tenantId, instanceId }));
  }

  async getSession(tenantId: string, instanceId: string, sessionId: string): Promise<SessionTranscript> {
    const transcript = await this.storage('load', () => this.store.find({ tenantId, instanceId }, sessionId));
    if (!transcript) {
      throw new NotFoundError(`Session '${sessionId}' not found`);
    }
    return transcript;
  }

  private async storage<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      logger.error({ action, error: errorMessage(error) }, 'Transcript store operation failed');
      throw new StorageError(`Failed to ${action} session transcript`, { cause: error });
    }
  }
}
