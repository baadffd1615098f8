/**
 * Model Routing
 *
 * Maps each model role (planner, generator, analyst) to a model
 * configuration, talks to the matching provider SDK, normalises the
 * response and tracks cost per role.
 *
 * One router is built per process and handed to the components that need
 * it. Components only see the narrow TextCompletion capability.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { TextBlock } from '@anthropic-ai/sdk/resources/messages';
import OpenAI from 'openai';

// ============================================================================
// Provider & Model Configuration
// ============================================================================

/** `openai` covers any OpenAI-compatible endpoint (Ollama, vLLM, OpenAI itself) */
export type Provider = 'anthropic' | 'openai';

export type ModelRole = 'planner' | 'generator' | 'analyst';

export const MODEL_ROLES: readonly ModelRole[] = ['planner', 'generator', 'analyst'];

export interface ModelConfig {
  /** Model identifier for API calls */
  id: string;
  provider: Provider;
  /** Environment variable holding the API key; omitted for keyless local servers */
  apiKeyEnv?: string;
  /** Custom base URL (Ollama, gateways) */
  baseURL?: string;
  /** Cost per 1M tokens */
  costs: {
    inputPer1M: number;
    outputPer1M: number;
  };
}

export type RoleModels = Record<ModelRole, ModelConfig>;

export type ProviderPreset = 'ollama' | 'anthropic' | 'openai';

export const OLLAMA_BASE_URL = 'http://localhost:11434/v1';

const LOCAL_COSTS = { inputPer1M: 0, outputPer1M: 0 };

/**
 * Default role models per provider preset.
 */
export const PRESET_MODELS: Record<ProviderPreset, RoleModels> = {
  ollama: {
    planner: { id: 'qwen3:14b', provider: 'openai', baseURL: OLLAMA_BASE_URL, costs: LOCAL_COSTS },
    generator: { id: 'codellama:13b', provider: 'openai', baseURL: OLLAMA_BASE_URL, costs: LOCAL_COSTS },
    analyst: { id: 'gemma3:latest', provider: 'openai', baseURL: OLLAMA_BASE_URL, costs: LOCAL_COSTS },
  },
  anthropic: {
    planner: {
      id: 'claude-3-5-haiku-20241022',
      provider: 'anthropic',
      apiKeyEnv: 'ANTHROPIC_API_KEY',
      costs: { inputPer1M: 0.8, outputPer1M: 4.0 },
    },
    generator: {
      id: 'claude-sonnet-4-20250514',
      provider: 'anthropic',
      apiKeyEnv: 'ANTHROPIC_API_KEY',
      costs: { inputPer1M: 3.0, outputPer1M: 15.0 },
    },
    analyst: {
      id: 'claude-3-5-haiku-20241022',
      provider: 'anthropic',
      apiKeyEnv: 'ANTHROPIC_API_KEY',
      costs: { inputPer1M: 0.8, outputPer1M: 4.0 },
    },
  },
  openai: {
    planner: {
      id: 'gpt-4o-mini',
      provider: 'openai',
      apiKeyEnv: 'OPENAI_API_KEY',
      costs: { inputPer1M: 0.15, outputPer1M: 0.6 },
    },
    generator: {
      id: 'gpt-4o',
      provider: 'openai',
      apiKeyEnv: 'OPENAI_API_KEY',
      costs: { inputPer1M: 2.5, outputPer1M: 10.0 },
    },
    analyst: {
      id: 'gpt-4o-mini',
      provider: 'openai',
      apiKeyEnv: 'OPENAI_API_KEY',
      costs: { inputPer1M: 0.15, outputPer1M: 0.6 },
    },
  },
};

// ============================================================================
// Call Options & Results
// ============================================================================

export interface ModelCallOptions {
  role: ModelRole;
  systemPrompt: string;
  userPrompt: string;
  /** Maximum tokens for response (default: 4096) */
  maxTokens?: number;
  /** Temperature for generation (default: 0) */
  temperature?: number;
}

export type StopReason = 'end_turn' | 'max_tokens' | 'stop_sequence';

export interface ModelCallResult {
  content: string;
  role: ModelRole;
  model: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  latencyMs: number;
  stopReason?: StopReason;
}

/**
 * The only model capability the pipeline stages depend on.
 */
export interface TextCompletion {
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface ModelRouterConfig {
  models?: Partial<RoleModels>;
  preset?: ProviderPreset;
  /** Pre-built clients used for every role on that provider */
  clients?: {
    anthropic?: Anthropic;
    openai?: OpenAI;
  };
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Utility Functions
// ============================================================================

export function calculateCost(config: ModelConfig, inputTokens: number, outputTokens: number): number {
  return (
    (inputTokens / 1_000_000) * config.costs.inputPer1M +
    (outputTokens / 1_000_000) * config.costs.outputPer1M
  );
}

/**
 * API key env vars that role models need but the environment lacks.
 */
export function validateApiKeys(models: RoleModels, env: NodeJS.ProcessEnv = process.env): string[] {
  const missing = new Set<string>();
  for (const role of MODEL_ROLES) {
    const keyEnv = models[role].apiKeyEnv;
    if (keyEnv && !env[keyEnv]) {
      missing.add(keyEnv);
    }
  }
  return Array.from(missing);
}

// ============================================================================
// ModelRouter
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const router = new ModelRouter({ preset: 'ollama' });
 * const planner = new Planner(router.completionFor('planner'));
 * ```
 */
export class ModelRouter {
  private models: RoleModels;
  private env: NodeJS.ProcessEnv;
  private injectedAnthropic: Anthropic | null;
  private injectedOpenAI: OpenAI | null;
  private anthropicClients: Map<string, Anthropic> = new Map();
  private openaiClients: Map<string, OpenAI> = new Map();
  private costAccumulator: Map<ModelRole, number> = new Map([
    ['planner', 0],
    ['generator', 0],
    ['analyst', 0],
  ]);

  constructor(config: ModelRouterConfig = {}) {
    this.models = { ...PRESET_MODELS[config.preset ?? 'ollama'], ...config.models };
    this.env = config.env ?? process.env;
    this.injectedAnthropic = config.clients?.anthropic ?? null;
    this.injectedOpenAI = config.clients?.openai ?? null;
  }

  getModelForRole(role: ModelRole): ModelConfig {
    return this.models[role];
  }

  /**
   * Narrow TextCompletion bound to one role.
   */
  completionFor(role: ModelRole, options: { maxTokens?: number; temperature?: number } = {}): TextCompletion {
    return {
      complete: async (systemPrompt, userPrompt) => {
        const result = await this.call({ role, systemPrompt, userPrompt, ...options });
        return result.content;
      },
    };
  }

  /**
   * Make a role-routed call on the provider configured for that role.
   */
  async call(options: ModelCallOptions): Promise<ModelCallResult> {
    const modelConfig = this.models[options.role];
    const result = modelConfig.provider === 'anthropic'
      ? await this.callAnthropic(options, modelConfig)
      : await this.callOpenAI(options, modelConfig);

    this.costAccumulator.set(
      options.role,
      (this.costAccumulator.get(options.role) ?? 0) + result.costUsd
    );
    console.log(
      `[ModelRouter] ${options.role} → ${modelConfig.id}: ` +
      `${result.inputTokens} in / ${result.outputTokens} out, ${result.latencyMs}ms`
    );
    return result;
  }

  private apiKeyFor(modelConfig: ModelConfig): string | undefined {
    return modelConfig.apiKeyEnv ? this.env[modelConfig.apiKeyEnv] : undefined;
  }

  private anthropicClientFor(modelConfig: ModelConfig): Anthropic {
    if (this.injectedAnthropic) return this.injectedAnthropic;

    const key = modelConfig.baseURL ?? 'default';
    const cached = this.anthropicClients.get(key);
    if (cached) return cached;

    const apiKey = this.apiKeyFor(modelConfig);
    if (!apiKey) {
      throw new Error(
        `Anthropic client not initialized. Set ${modelConfig.apiKeyEnv ?? 'ANTHROPIC_API_KEY'} environment variable.`
      );
    }
    const client = new Anthropic({ apiKey, baseURL: modelConfig.baseURL });
    this.anthropicClients.set(key, client);
    return client;
  }

  private openaiClientFor(modelConfig: ModelConfig): OpenAI {
    if (this.injectedOpenAI) return this.injectedOpenAI;

    const key = modelConfig.baseURL ?? 'default';
    const cached = this.openaiClients.get(key);
    if (cached) return cached;

    const apiKey = this.apiKeyFor(modelConfig);
    if (modelConfig.apiKeyEnv && !apiKey) {
      throw new Error(
        `OpenAI client not initialized. Set ${modelConfig.apiKeyEnv} environment variable.`
      );
    }
    // Local servers accept any key
    const client = new OpenAI({ apiKey: apiKey ?? 'local', baseURL: modelConfig.baseURL });
    this.openaiClients.set(key, client);
    return client;
  }

  /**
   * Call Anthropic API (Claude models).
   */
  private async callAnthropic(options: ModelCallOptions, modelConfig: ModelConfig): Promise<ModelCallResult> {
    const client = this.anthropicClientFor(modelConfig);
    const startTime = Date.now();

    const response = await client.messages.create({
      model: modelConfig.id,
      max_tokens: options.maxTokens ?? 4096,
      temperature: options.temperature ?? 0,
      system: options.systemPrompt,
      messages: [{ role: 'user', content: options.userPrompt }],
    });

    const inputTokens = response.usage.input_tokens;
    const outputTokens = response.usage.output_tokens;
    const content = response.content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      content,
      role: options.role,
      model: modelConfig.id,
      inputTokens,
      outputTokens,
      costUsd: calculateCost(modelConfig, inputTokens, outputTokens),
      latencyMs: Date.now() - startTime,
      stopReason: this.normalizeAnthropicStopReason(response.stop_reason),
    };
  }

  /**
   * Call an OpenAI-compatible API.
   */
  private async callOpenAI(options: ModelCallOptions, modelConfig: ModelConfig): Promise<ModelCallResult> {
    const client = this.openaiClientFor(modelConfig);
    const startTime = Date.now();

    const response = await client.chat.completions.create({
      model: modelConfig.id,
      max_tokens: options.maxTokens ?? 4096,
      temperature: options.temperature ?? 0,
      messages: [
        { role: 'system', content: options.systemPrompt },
        { role: 'user', content: options.userPrompt },
      ],
    });

    const choice = response.choices[0];
    const inputTokens = response.usage?.prompt_tokens ?? 0;
    const outputTokens = response.usage?.completion_tokens ?? 0;

    return {
      content: choice?.message.content ?? '',
      role: options.role,
      model: modelConfig.id,
      inputTokens,
      outputTokens,
      costUsd: calculateCost(modelConfig, inputTokens, outputTokens),
      latencyMs: Date.now() - startTime,
      stopReason: this.normalizeOpenAIStopReason(choice?.finish_reason ?? null),
    };
  }

  private normalizeAnthropicStopReason(reason: string | null): StopReason | undefined {
    switch (reason) {
      case 'end_turn':
        return 'end_turn';
      case 'max_tokens':
        return 'max_tokens';
      case 'stop_sequence':
        return 'stop_sequence';
      default:
        return undefined;
    }
  }

  private normalizeOpenAIStopReason(reason: string | null): StopReason | undefined {
    switch (reason) {
      case 'stop':
        return 'end_turn';
      case 'length':
        return 'max_tokens';
      default:
        return undefined;
    }
  }

  /**
   * Accumulated cost in USD per role.
   */
  getCostBreakdown(): Record<ModelRole, number> {
    return {
      planner: this.costAccumulator.get('planner') ?? 0,
      generator: this.costAccumulator.get('generator') ?? 0,
      analyst: this.costAccumulator.get('analyst') ?? 0,
    };
  }

  getTotalCost(): number {
    return Array.from(this.costAccumulator.values()).reduce((a, b) => a + b, 0);
  }

  resetCostAccumulator(): void {
    this.costAccumulator = new Map([
      ['planner', 0],
      ['generator', 0],
      ['analyst', 0],
    ]);
  }
}

export function createModelRouter(config?: ModelRouterConfig): ModelRouter {
  return new ModelRouter(config);
}
