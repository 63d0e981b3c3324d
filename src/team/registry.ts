/**
 * Binding registry: provider tag to model factory, tool kind to tool factory.
 *
 * Built once at startup by the composition root. Tool factories declare
 * their own defaults; the caller's options are layered on top.
 */
import { logger } from '../config';
import { ModelBindingError, ToolBindingError } from '../errors';
import type { ModelProvider, ToolKind, ToolOptions, ToolSpec } from '../types/hierarchy';
import type { ModelBinding, ModelDescriptor, ToolBinding } from './types';

export type ModelFactory<M> = (modelId: string) => M;

export interface ToolFactory<T> {
  defaults?: ToolOptions;
  create(options: ToolOptions): T[];
}

export class BindingRegistry<M, T> {
  private readonly models = new Map<ModelProvider, ModelFactory<M>>();
  private readonly tools = new Map<ToolKind, ToolFactory<T>>();

  /**
   * @param fallback - provider/model pair used when a provider has no factory
   */
  constructor(private readonly fallback: ModelDescriptor) {}

  registerModel(provider: ModelProvider, factory: ModelFactory<M>): this {
    this.models.set(provider, factory);
    return this;
  }

  registerTool(kind: ToolKind, factory: ToolFactory<T>): this {
    this.tools.set(kind, factory);
    return this;
  }

  hasModel(provider: ModelProvider): boolean {
    return this.models.has(provider);
  }

  hasTool(kind: ToolKind): boolean {
    return this.tools.has(kind);
  }

  resolveModel(provider: ModelProvider, modelId: string): ModelBinding<M> {
    let target: ModelDescriptor = { provider, modelId };
    let factory = this.models.get(provider);

    if (!factory) {
      logger.warn(
        { provider, modelId, fallback: this.fallback },
        'No model factory for provider, using fallback model'
      );
      target = this.fallback;
      factory = this.models.get(target.provider);
      if (!factory) {
        throw new ModelBindingError(target.provider, target.modelId);
      }
    }

    try {
      return { ...target, model: factory(target.modelId) };
    } catch (error) {
      throw new ModelBindingError(target.provider, target.modelId, { cause: error });
    }
  }

  resolveTool(spec: ToolSpec): ToolBinding<T> {
    const factory = this.tools.get(spec.kind);
    if (!factory) {
      throw new ToolBindingError(spec.kind);
    }

    const options: ToolOptions = { ...factory.defaults, ...spec.options };
    try {
      return { kind: spec.kind, options, tools: factory.create(options) };
    } catch (error) {
      throw new ToolBindingError(spec.kind, { cause: error });
    }
  }
}
