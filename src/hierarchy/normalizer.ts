/**
 * Input normalization for hierarchy updates.
 *
 * Clients send agents in several shapes (snake_case or camelCase keys,
 * tools as bare strings or records, providers in any case). Everything is
 * resolved here into typed AgentSpec values so nothing downstream branches
 * on the raw shape again.
 *
 * Tolerance is per entry: an unknown tool kind drops that tool, a malformed
 * agent drops that agent, an unknown provider falls back to the default.
 */
import { randomUUID } from 'node:crypto';
import { config, logger } from '../config';
import { UnknownEnumValueError, ValidationError, errorMessage } from '../errors';
import {
  defaultModelProvider,
  isToolKind,
  parseModelProvider,
  type AgentSpec,
  type HierarchyUpdate,
  type ModelProvider,
  type ToolKind,
  type ToolOptions,
  type ToolSpec,
} from '../types/hierarchy';

export interface NormalizerDefaults {
  modelProvider: ModelProvider;
  modelId: string;
}

/**
 * A tool entry after its shape has been resolved.
 */
export type ToolEntry =
  | { tag: 'bare'; kind: ToolKind }
  | { tag: 'record'; kind: ToolKind; options?: ToolOptions }
  | { tag: 'invalid'; reason: string; raw: unknown };

type LooseRecord = Record<string, unknown>;

function isRecord(value: unknown): value is LooseRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstDefined(raw: LooseRecord, keys: string[]): unknown {
  for (const key of keys) {
    if (raw[key] !== undefined && raw[key] !== null) {
      return raw[key];
    }
  }
  return undefined;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export { parseModelProvider };

export function configuredDefaults(): NormalizerDefaults {
  return {
    modelProvider: defaultModelProvider(config.defaults.modelProvider),
    modelId: config.defaults.modelId,
  };
}

/**
 * Resolve a tool kind in any case. Returns undefined for unknown values.
 */
export function parseToolKind(value: unknown): ToolKind | undefined {
  if (typeof value !== 'string') return undefined;
  const lower = value.trim().toLowerCase();
  return isToolKind(lower) ? lower : undefined;
}

function parseToolOptions(raw: unknown, kind: ToolKind): ToolOptions | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw)) {
    logger.warn({ kind, options: raw }, 'Ignoring non-object tool options');
    return undefined;
  }

  const options: ToolOptions = {};
  for (const [key, value] of Object.entries(raw)) {
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean' ||
      value === null
    ) {
      options[key] = value;
    } else {
      logger.warn({ kind, option: key }, 'Ignoring non-scalar tool option');
    }
  }
  return options;
}

/**
 * Classify one raw tool entry.
 */
export function parseToolEntry(raw: unknown): ToolEntry {
  if (typeof raw === 'string') {
    const kind = parseToolKind(raw);
    return kind
      ? { tag: 'bare', kind }
      : { tag: 'invalid', reason: new UnknownEnumValueError('tool kind', raw).message, raw };
  }

  if (isRecord(raw)) {
    const rawKind = firstDefined(raw, ['type', 'kind']);
    if (rawKind === undefined) {
      return { tag: 'invalid', reason: 'tool record has no type or kind', raw };
    }
    const kind = parseToolKind(rawKind);
    if (!kind) {
      return { tag: 'invalid', reason: new UnknownEnumValueError('tool kind', rawKind).message, raw };
    }
    const options = parseToolOptions(firstDefined(raw, ['config', 'options']), kind);
    return options ? { tag: 'record', kind, options } : { tag: 'record', kind };
  }

  return { tag: 'invalid', reason: `unsupported tool entry of type ${typeof raw}`, raw };
}

function toToolSpec(entry: Exclude<ToolEntry, { tag: 'invalid' }>): ToolSpec {
  switch (entry.tag) {
    case 'bare':
      return { kind: entry.kind };
    case 'record':
      return entry.options ? { kind: entry.kind, options: entry.options } : { kind: entry.kind };
  }
}

/**
 * Normalize a tool list, dropping entries that cannot be resolved.
 */
export function normalizeTools(raw: unknown, agentName = 'unknown'): ToolSpec[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    logger.warn({ agent: agentName, tools: raw }, 'Tools is not a list, ignoring');
    return [];
  }

  const tools: ToolSpec[] = [];
  for (const item of raw) {
    const entry = parseToolEntry(item);
    if (entry.tag === 'invalid') {
      logger.warn({ agent: agentName, reason: entry.reason }, 'Dropping tool entry');
      continue;
    }
    tools.push(toToolSpec(entry));
  }
  return tools;
}

function requireText(raw: LooseRecord, key: string): string {
  const value = optionalString(raw[key]);
  if (!value) {
    throw new ValidationError(`agent ${key} is required`, key);
  }
  return value;
}

/**
 * Convert one loosely-typed agent payload into an AgentSpec.
 *
 * A missing role is stored as an empty string; only the name is required.
 *
 * @throws ValidationError when the payload is not an object or lacks a name
 */
export function normalizeAgent(raw: unknown, defaults: NormalizerDefaults = configuredDefaults()): AgentSpec {
  if (!isRecord(raw)) {
    throw new ValidationError('agent entry must be an object');
  }

  const name = requireText(raw, 'name');
  const role = optionalString(raw.role) ?? '';

  const rawProvider = firstDefined(raw, ['model_provider', 'modelProvider', 'provider']);
  let modelProvider = parseModelProvider(rawProvider);
  if (!modelProvider) {
    if (rawProvider !== undefined) {
      logger.warn(
        { agent: name, reason: new UnknownEnumValueError('model provider', rawProvider).message },
        'Falling back to default model provider'
      );
    }
    modelProvider = defaults.modelProvider;
  }

  const agent: AgentSpec = {
    id: optionalString(firstDefined(raw, ['agent_id', 'agentId', 'id'])) ?? randomUUID(),
    name,
    role,
    modelProvider,
    modelId: optionalString(firstDefined(raw, ['model_id', 'modelId'])) ?? defaults.modelId,
    tools: normalizeTools(raw.tools, name),
  };

  const parentId = optionalString(firstDefined(raw, ['parent_id', 'parentId']));
  if (parentId) {
    agent.parentId = parentId;
  }

  return agent;
}

/**
 * Normalize an agent list. A malformed agent is dropped, never the list.
 */
export function normalizeAgents(raw: unknown[], defaults: NormalizerDefaults = configuredDefaults()): AgentSpec[] {
  const agents: AgentSpec[] = [];
  raw.forEach((item, index) => {
    try {
      agents.push(normalizeAgent(item, defaults));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.warn({ index, reason: errorMessage(error) }, 'Dropping agent entry');
    }
  });
  return agents;
}

/**
 * Build a HierarchyUpdate from a request body. Only fields the client
 * actually sent (and did not null out) end up in the update.
 */
export function normalizeHierarchyUpdate(
  body: LooseRecord,
  defaults: NormalizerDefaults = configuredDefaults()
): HierarchyUpdate {
  const update: HierarchyUpdate = {};

  const instructions = firstDefined(body, [
    'router_instructions',
    'routerInstructions',
    'delegator_instructions',
    'delegatorInstructions',
  ]);
  if (instructions !== undefined) {
    if (typeof instructions !== 'string') {
      throw new ValidationError('delegator instructions must be a string', 'delegatorInstructions');
    }
    update.delegatorInstructions = instructions;
  }

  const agents = body.agents;
  if (agents !== undefined && agents !== null) {
    if (!Array.isArray(agents)) {
      throw new ValidationError('agents must be a list', 'agents');
    }
    update.agents = normalizeAgents(agents, defaults);
  }

  return update;
}
