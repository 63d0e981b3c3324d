import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../errors';
import { normalizeHierarchyUpdate } from '../hierarchy/normalizer';
import type { HierarchyService } from '../services/HierarchyService';
import type { SessionService } from '../services/SessionService';
import type { TeamChatService } from '../services/TeamChatService';
import type { HierarchyConfig } from '../types/hierarchy';

export interface AgentRouteDeps {
  chat: TeamChatService;
  hierarchies: HierarchyService;
  sessions: SessionService;
}

const idField = z.string().trim().min(1);

// Clients send either snake_case or camelCase; user_id is the tenant id
const keyFields = {
  user_id: idField.optional(),
  tenant_id: idField.optional(),
  tenantId: idField.optional(),
  instance_id: idField.optional(),
  instanceId: idField.optional(),
};

const chatSchema = z.object({
  ...keyFields,
  session_id: idField.optional(),
  sessionId: idField.optional(),
  message: z.string({ error: 'is required' }).min(1, { error: 'must not be empty' }),
  customer_name: z.string().optional(),
  customerName: z.string().optional(),
  timeout_ms: z.number().int().nonnegative().optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
});

const hierarchySchema = z.looseObject(keyFields);

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

function parseBody<S extends z.ZodType>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue?.path.join('.');
    throw new ValidationError(issue ? `${field || 'body'}: ${issue.message}` : 'Invalid request', field);
  }
  return result.data;
}

function required(value: string | undefined, field: string): string {
  if (!value) {
    throw new ValidationError(`${field} is required`, field);
  }
  return value;
}

function toResponse(hierarchy: HierarchyConfig) {
  return {
    tenantId: hierarchy.tenantId,
    instanceId: hierarchy.instanceId,
    delegatorInstructions: hierarchy.delegatorInstructions,
    agents: hierarchy.agents,
    createdAt: hierarchy.createdAt.toISOString(),
    updatedAt: hierarchy.updatedAt.toISOString(),
  };
}

export function createAgentRoutes({ chat, hierarchies, sessions }: AgentRouteDeps): Hono {
  const app = new Hono();

  /**
   * POST /agent/chat
   * Send one message to the instance's team
   */
  app.post('/chat', async (c) => {
    const body = parseBody(chatSchema, await readJson(c));

    const result = await chat.chat({
      tenantId: required(body.user_id ?? body.tenant_id ?? body.tenantId, 'user_id'),
      instanceId: required(body.instance_id ?? body.instanceId, 'instance_id'),
      sessionId: required(body.session_id ?? body.sessionId, 'session_id'),
      message: body.message,
      customerName: body.customer_name ?? body.customerName,
      timeoutMs: body.timeout_ms ?? body.timeoutMs,
    });

    return c.json(result);
  });

  /**
   * PUT /agent/hierarchy
   * Create or partially update an instance's hierarchy
   */
  app.put('/hierarchy', async (c) => {
    const body = parseBody(hierarchySchema, await readJson(c));
    const tenantId = required(body.user_id ?? body.tenant_id ?? body.tenantId, 'user_id');
    const instanceId = required(body.instance_id ?? body.instanceId, 'instance_id');

    const update = normalizeHierarchyUpdate(body);
    const instance = await hierarchies.upsertHierarchy(tenantId, instanceId, update);

    return c.json({ message: 'Hierarchy updated', instance: toResponse(instance) });
  });

  /**
   * GET /agent/hierarchy/:tenantId/:instanceId
   */
  app.get('/hierarchy/:tenantId/:instanceId', async (c) => {
    const hierarchy = await hierarchies.getHierarchy(c.req.param('tenantId'), c.req.param('instanceId'));
    return c.json(toResponse(hierarchy));
  });

  /**
   * GET /agent/instances/:tenantId
   */
  app.get('/instances/:tenantId', async (c) => {
    const instances = await hierarchies.listInstances(c.req.param('tenantId'));
    return c.json({ instances: instances.map(toResponse) });
  });

  /**
   * GET /agent/sessions/:tenantId/:instanceId
   */
  app.get('/sessions/:tenantId/:instanceId', async (c) => {
    const list = await sessions.listSessions(c.req.param('tenantId'), c.req.param('instanceId'));
    return c.json({
      sessions: list.map((session) => ({
        sessionId: session.sessionId,
        messageCount: session.messageCount,
        createdAt: session.createdAt.toISOString(),
        updatedAt: session.updatedAt.toISOString(),
      })),
    });
  });

  /**
   * GET /agent/sessions/:tenantId/:instanceId/:sessionId
   */
  app.get('/sessions/:tenantId/:instanceId/:sessionId', async (c) => {
    const transcript = await sessions.getSession(
      c.req.param('tenantId'),
      c.req.param('instanceId'),
      c.req.param('sessionId')
    );
    return c.json({
      ...transcript,
      createdAt: transcript.createdAt.toISOString(),
      updatedAt: transcript.updatedAt.toISOString(),
    });
  });

  return app;
}
