/**
 * Configuration model for agent team hierarchies.
 *
 * Plain data only: the normalizer produces these, the store persists them
 * and the assembler turns them into a runtime team.
 */

export const MODEL_PROVIDERS = ['openai', 'claude', 'gemini', 'groq'] as const;
export type ModelProvider = (typeof MODEL_PROVIDERS)[number];

export const TOOL_KINDS = ['duckduckgo', 'yfinance'] as const;
export type ToolKind = (typeof TOOL_KINDS)[number];

export type ToolOptionValue = string | number | boolean | null;
export type ToolOptions = Record<string, ToolOptionValue>;

export interface ToolSpec {
  kind: ToolKind;
  options?: ToolOptions;
}

export interface AgentSpec {
  id: string;
  name: string;
  /** Free-text instruction describing what the agent is for */
  role: string;
  modelProvider: ModelProvider;
  modelId: string;
  tools: ToolSpec[];
  /** Reporting line inside the same hierarchy; stored, not enforced */
  parentId?: string | null;
}

export interface HierarchyKey {
  tenantId: string;
  instanceId: string;
}

export interface HierarchyConfig extends HierarchyKey {
  delegatorInstructions: string;
  agents: AgentSpec[];
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Partial update sent by a client. An absent property means "leave as is";
 * a present one replaces the stored field wholesale.
 */
export interface HierarchyUpdate {
  delegatorInstructions?: string;
  agents?: AgentSpec[];
}

export const DEFAULT_DELEGATOR_INSTRUCTIONS =
  'You are an intelligent router. Analyse the user message and delegate the task ' +
  'to the most suitable specialist on your team. Reply with the specialist answer.';

export function isModelProvider(value: unknown): value is ModelProvider {
  return MODEL_PROVIDERS.some((provider) => provider === value);
}

const PROVIDER_ALIASES: Record<string, ModelProvider> = {
  anthropic: 'claude',
};

/**
 * Resolve a provider value in any case. Returns undefined for unknown values.
 */
export function parseModelProvider(value: unknown): ModelProvider | undefined {
  if (typeof value !== 'string') return undefined;
  const lower = value.trim().toLowerCase();
  if (isModelProvider(lower)) return lower;
  return PROVIDER_ALIASES[lower];
}

/**
 * Provider named by DEFAULT_MODEL_PROVIDER; unknown values degrade to gemini.
 */
export function defaultModelProvider(value: string): ModelProvider {
  return parseModelProvider(value) ?? 'gemini';
}

export function isToolKind(value: unknown): value is ToolKind {
  return TOOL_KINDS.some((kind) => kind === value);
}

export function cacheKeyOf({ tenantId, instanceId }: HierarchyKey): string {
  return `${encodeURIComponent(tenantId)}:${encodeURIComponent(instanceId)}`;
}
