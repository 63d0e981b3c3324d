import { anthropic, gemini, openai, type Tool } from '@inngest/agent-kit';
import type { Config } from '../../config';
import { logger } from '../../config';
import { MODEL_PROVIDERS, TOOL_KINDS, defaultModelProvider } from '../../types/hierarchy';
import { BindingRegistry } from '../registry';
import type { ModelDescriptor } from '../types';
import { duckDuckGoToolFactory, yFinanceToolFactory } from './tools';

export type AgentKitModel =
  | ReturnType<typeof openai>
  | ReturnType<typeof anthropic>
  | ReturnType<typeof gemini>;

export type AgentKitRegistry = BindingRegistry<AgentKitModel, Tool.Any>;

const ANTHROPIC_MAX_TOKENS = 4096;

export function fallbackModel(config: Pick<Config, 'defaults'>): ModelDescriptor {
  return {
    provider: defaultModelProvider(config.defaults.modelProvider),
    modelId: config.defaults.modelId,
  };
}

/**
 * Registry with every provider and tool kind the server supports.
 * Providers without an API key are left out, so they resolve to the fallback.
 */
export function createAgentKitRegistry(config: Pick<Config, 'providers' | 'defaults'>): AgentKitRegistry {
  const { providers } = config;
  const registry: AgentKitRegistry = new BindingRegistry(fallbackModel(config));

  if (providers.openai.apiKey) {
    const apiKey = providers.openai.apiKey;
    registry.registerModel('openai', (model) => openai({ model, apiKey }));
  }
  if (providers.anthropic.apiKey) {
    const apiKey = providers.anthropic.apiKey;
    registry.registerModel('claude', (model) =>
      anthropic({ model, apiKey, defaultParameters: { max_tokens: ANTHROPIC_MAX_TOKENS } })
    );
  }
  if (providers.gemini.apiKey) {
    const apiKey = providers.gemini.apiKey;
    registry.registerModel('gemini', (model) => gemini({ model, apiKey }));
  }
  if (providers.groq.apiKey) {
    const { apiKey, baseUrl } = providers.groq;
    registry.registerModel('groq', (model) => openai({ model, apiKey, baseUrl }));
  }

  registry.registerTool('duckduckgo', duckDuckGoToolFactory).registerTool('yfinance', yFinanceToolFactory);

  logger.info(
    {
      providers: MODEL_PROVIDERS.filter((provider) => registry.hasModel(provider)),
      tools: TOOL_KINDS.filter((kind) => registry.hasTool(kind)),
    },
    'Binding registry ready'
  );
  return registry;
}
