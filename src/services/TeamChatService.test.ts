import { FakeEngine, InMemoryHierarchyStore, createFakeRegistry } from '../__tests__/utils';
import { AssemblyError, RunTimeoutError } from '../errors';
import { normalizeHierarchyUpdate } from '../hierarchy/normalizer';
import { TeamAssembler } from '../team/TeamAssembler';
import { TeamCache } from '../team/TeamCache';
import { HierarchyService } from './HierarchyService';
import { TeamChatService, formatChatInput } from './TeamChatService';

const defaults = { modelProvider: 'gemini' as const, modelId: 'gemini-1.5-flash' };

describe('formatChatInput', () => {
  it('prefixes the customer name', () => {
    expect(formatChatInput('hello', 'Maria')).toBe('[Customer: Maria] hello');
  });

  it('leaves the message alone without a name', () => {
    expect(formatChatInput('hello')).toBe('hello');
    expect(formatChatInput('hello', '  ')).toBe('hello');
  });
});

describe('TeamChatService', () => {
  let store: InMemoryHierarchyStore;
  let engine: FakeEngine;
  let cache: TeamCache;
  let hierarchies: HierarchyService;
  let service: TeamChatService;

  beforeEach(() => {
    store = new InMemoryHierarchyStore();
    engine = new FakeEngine();
    const assembler = new TeamAssembler(createFakeRegistry(), engine, {
      delegatorModel: { provider: 'gemini', modelId: 'gemini-1.5-flash' },
    });
    cache = new TeamCache((tenantId, instanceId) => hierarchies.loadOrProvision(tenantId, instanceId), assembler);
    hierarchies = new HierarchyService(store, cache);
    service = new TeamChatService(cache, 0);
  });

  async function configure(tenantId: string, instanceId: string, body: Record<string, unknown>) {
    return hierarchies.upsertHierarchy(tenantId, instanceId, normalizeHierarchyUpdate(body, defaults));
  }

  it('answers through the configured analyst', async () => {
    await configure('t1', 'i1', {
      agents: [{ name: 'Analyst', role: 'Answers finance questions', tools: ['YFINANCE'] }],
    });

    const result = await service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's1', message: 'What is AAPL at?' });

    expect(result).toEqual({ response: 'Analyst: What is AAPL at?', sessionId: 's1', success: true });
    const [member] = engine.built;
    expect(member?.toolNames).toEqual([
      'get_stock_price',
      'get_analyst_recommendations',
      'get_company_info',
      'get_company_news',
    ]);
  });

  it('passes session identity with each run', async () => {
    await configure('t1', 'i1', { agents: [{ name: 'Analyst', role: 'r' }] });

    await service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's1', message: 'one' });
    await service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's2', message: 'two', customerName: 'Maria' });

    expect(engine.delegators).toHaveLength(1);
    expect(engine.delegators[0]?.runs).toEqual([
      { input: 'one', context: { tenantId: 't1', instanceId: 'i1', sessionId: 's1' } },
      { input: '[Customer: Maria] two', context: { tenantId: 't1', instanceId: 'i1', sessionId: 's2' } },
    ]);
  });

  it('provisions an empty team on first contact', async () => {
    const result = await service.chat({ tenantId: 't9', instanceId: 'new', sessionId: 's1', message: 'hi' });

    expect(result.response).toBe('no members: hi');
    expect(store.documents.size).toBe(1);
  });

  it('uses the new configuration after an update', async () => {
    await configure('t1', 'i1', { agents: [{ name: 'Analyst', role: 'r' }] });
    await service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's1', message: 'first' });

    await configure('t1', 'i1', { agents: [{ name: 'Writer', role: 'r' }] });
    const result = await service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's1', message: 'second' });

    expect(result.response).toBe('Writer: second');
    expect(engine.delegators).toHaveLength(2);
  });

  it('keeps instances of one tenant apart', async () => {
    await configure('t1', 'i1', { agents: [{ name: 'Analyst', role: 'r' }] });
    await configure('t1', 'i2', { agents: [{ name: 'Writer', role: 'r' }] });

    const a = await service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's', message: 'x' });
    const b = await service.chat({ tenantId: 't1', instanceId: 'i2', sessionId: 's', message: 'x' });

    expect([a.response, b.response]).toEqual(['Analyst: x', 'Writer: x']);
  });

  it('times out slow runs and keeps the team cached', async () => {
    await configure('t1', 'i1', { agents: [{ name: 'Analyst', role: 'r' }] });
    engine.responder = () => new Promise<string>(() => undefined);

    await expect(
      service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's1', message: 'slow', timeoutMs: 20 })
    ).rejects.toThrow(RunTimeoutError);
    expect(cache.has('t1', 'i1')).toBe(true);
  });

  it('propagates run failures and keeps the team cached', async () => {
    engine.responder = async () => {
      throw new Error('model unavailable');
    };

    await expect(service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's1', message: 'x' })).rejects.toThrow(
      'model unavailable'
    );
    expect(cache.has('t1', 'i1')).toBe(true);
  });

  it('propagates assembly failures without caching', async () => {
    await configure('t1', 'i1', { agents: [{ name: 'Broken', role: 'r' }] });
    engine.failOnAgent = 'Broken';

    await expect(service.chat({ tenantId: 't1', instanceId: 'i1', sessionId: 's1', message: 'x' })).rejects.toThrow(
      AssemblyError
    );
    expect(cache.has('t1', 'i1')).toBe(false);
  });
});
