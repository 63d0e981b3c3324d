import { InMemoryTranscriptStore } from '../__tests__/utils';
import { NotFoundError, StorageError } from '../errors';
import type { TranscriptStore } from '../stores/TranscriptStore';
import type { TranscriptMessage } from '../types/session';
import { SessionService } from './SessionService';

const key = { tenantId: 't1', instanceId: 'i1' };

function message(role: TranscriptMessage['role'], content: string): TranscriptMessage {
  return { role, content, createdAt: '2024-01-01T00:00:00.000Z' };
}

describe('SessionService', () => {
  let service: SessionService;

  beforeEach(() => {
    service = new SessionService(new InMemoryTranscriptStore());
  });

  it('creates a session on first append and extends it afterwards', async () => {
    await service.appendMessages(key, 's1', [message('user', 'hi')]);
    await service.appendMessages(key, 's1', [message('assistant', 'hello')]);

    const messages = await service.getMessages(key, 's1');
    expect(messages.map((m) => m.content)).toEqual(['hi', 'hello']);
  });

  it('returns no messages for an unknown session', async () => {
    expect(await service.getMessages(key, 'missing')).toEqual([]);
  });

  it('lists sessions most recent first with message counts', async () => {
    await service.appendMessages(key, 's1', [message('user', 'a'), message('assistant', 'b')]);
    await service.appendMessages(key, 's2', [message('user', 'c')]);
    await service.appendMessages({ tenantId: 't1', instanceId: 'other' }, 's3', [message('user', 'd')]);

    const sessions = await service.listSessions('t1', 'i1');
    expect(sessions.map(({ sessionId, messageCount }) => ({ sessionId, messageCount }))).toEqual([
      { sessionId: 's2', messageCount: 1 },
      { sessionId: 's1', messageCount: 2 },
    ]);
  });

  it('returns a full transcript', async () => {
    await service.appendMessages(key, 's1', [message('user', 'hi')]);

    const transcript = await service.getSession('t1', 'i1', 's1');
    expect(transcript.tenantId).toBe('t1');
    expect(transcript.messageCount).toBe(1);
    expect(transcript.messages).toEqual([message('user', 'hi')]);
  });

  it('throws NotFoundError for an unknown session', async () => {
    await expect(service.getSession('t1', 'i1', 'missing')).rejects.toThrow(NotFoundError);
  });

  it('wraps store failures in StorageError', async () => {
    const failing: TranscriptStore = {
      append: jest.fn().mockRejectedValue(new Error('disk full')),
      find: jest.fn().mockRejectedValue(new Error('disk full')),
      list: jest.fn().mockRejectedValue(new Error('disk full')),
    };
    const broken = new SessionService(failing);

    await expect(broken.appendMessages(key, 's1', [message('user', 'x')])).rejects.toThrow(StorageError);
    await expect(broken.listSessions('t1', 'i1')).rejects.toThrow('Failed to list session transcript');
  });

  it('skips empty appends', async () => {
    const store: TranscriptStore = {
      append: jest.fn(),
      find: jest.fn(),
      list: jest.fn(),
    };
    await new SessionService(store).appendMessages(key, 's1', []);
    expect(store.append).not.toHaveBeenCalled();
  });
});
