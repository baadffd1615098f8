/**
 * Unit Tests for Model Routing
 *
 * Test Categories:
 * 1. Preset role → model mapping
 * 2. Cost calculation and accumulation
 * 3. API key validation
 * 4. Provider routing with injected clients
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import type OpenAI from 'openai';
import {
  ModelRouter,
  OLLAMA_BASE_URL,
  PRESET_MODELS,
  calculateCost,
  validateApiKeys,
} from '../src/models.js';

// ============================================================================
// Mock Clients
// ============================================================================

function createMockOpenAI(content = 'openai says hi') {
  const create = vi.fn().mockResolvedValue({
    choices: [{ message: { content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 1000, completion_tokens: 500 },
  });
  const client = { chat: { completions: { create } } } as unknown as OpenAI;
  return { client, create };
}

function createMockAnthropic() {
  const create = vi.fn().mockResolvedValue({
    content: [
      { type: 'text', text: 'Hello' },
      { type: 'text', text: ' world' },
    ],
    usage: { input_tokens: 2000, output_tokens: 1000 },
    stop_reason: 'end_turn',
  });
  const client = { messages: { create } } as unknown as Anthropic;
  return { client, create };
}

// ============================================================================
// Presets
// ============================================================================

describe('PRESET_MODELS', () => {
  it('points every ollama role at the local server without a key', () => {
    for (const model of Object.values(PRESET_MODELS.ollama)) {
      expect(model.provider).toBe('openai');
      expect(model.baseURL).toBe(OLLAMA_BASE_URL);
      expect(model.apiKeyEnv).toBeUndefined();
    }
  });

  it('defaults the router to the ollama preset', () => {
    const router = new ModelRouter({ env: {} });
    expect(router.getModelForRole('generator').id).toBe('codellama:13b');
  });

  it('lets explicit role models override the preset', () => {
    const router = new ModelRouter({
      preset: 'openai',
      models: { analyst: { ...PRESET_MODELS.openai.analyst, id: 'gpt-custom' } },
      env: {},
    });
    expect(router.getModelForRole('analyst').id).toBe('gpt-custom');
    expect(router.getModelForRole('planner').id).toBe('gpt-4o-mini');
  });
});

// ============================================================================
// Costs & Keys
// ============================================================================

describe('calculateCost', () => {
  it('prices input and output tokens per million', () => {
    expect(calculateCost(PRESET_MODELS.openai.generator, 1_000_000, 1_000_000)).toBeCloseTo(12.5);
  });

  it('is free for local models', () => {
    expect(calculateCost(PRESET_MODELS.ollama.planner, 5000, 5000)).toBe(0);
  });
});

describe('validateApiKeys', () => {
  it('lists each missing key once', () => {
    expect(validateApiKeys(PRESET_MODELS.anthropic, {})).toEqual(['ANTHROPIC_API_KEY']);
  });

  it('passes when the key is set', () => {
    expect(validateApiKeys(PRESET_MODELS.anthropic, { ANTHROPIC_API_KEY: 'test-secret' })).toEqual([]);
  });

  it('needs nothing for ollama', () => {
    expect(validateApiKeys(PRESET_MODELS.ollama, {})).toEqual([]);
  });
});

// ============================================================================
// Routing
// ============================================================================

describe('ModelRouter', () => {
  let openai: ReturnType<typeof createMockOpenAI>;
  let anthropic: ReturnType<typeof createMockAnthropic>;

  beforeEach(() => {
    openai = createMockOpenAI();
    anthropic = createMockAnthropic();
  });

  it('sends system and user prompts to an OpenAI-compatible endpoint', async () => {
    const router = new ModelRouter({ preset: 'openai', clients: { openai: openai.client }, env: {} });

    const text = await router.completionFor('generator').complete('system text', 'user text');

    expect(text).toBe('openai says hi');
    expect(openai.create).toHaveBeenCalledWith({
      model: 'gpt-4o',
      max_tokens: 4096,
      temperature: 0,
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: 'user text' },
      ],
    });
  });

  it('normalises an anthropic response', async () => {
    const router = new ModelRouter({
      preset: 'anthropic',
      clients: { anthropic: anthropic.client },
      env: {},
    });

    const result = await router.call({ role: 'generator', systemPrompt: 's', userPrompt: 'u' });

    expect(result.content).toBe('Hello world');
    expect(result.model).toBe('claude-sonnet-4-20250514');
    expect(result.stopReason).toBe('end_turn');
    expect(result.costUsd).toBeCloseTo(0.021, 8);
    expect(anthropic.create).toHaveBeenCalledWith(
      expect.objectContaining({ system: 's', messages: [{ role: 'user', content: 'u' }] })
    );
  });

  it('accumulates cost per role', async () => {
    const router = new ModelRouter({ preset: 'openai', clients: { openai: openai.client }, env: {} });

    await router.completionFor('planner').complete('s', 'u');
    await router.completionFor('planner').complete('s', 'u');

    const breakdown = router.getCostBreakdown();
    expect(breakdown.planner).toBeCloseTo(0.0009, 8);
    expect(breakdown.generator).toBe(0);
    expect(router.getTotalCost()).toBeCloseTo(0.0009, 8);

    router.resetCostAccumulator();
    expect(router.getTotalCost()).toBe(0);
  });

  it('fails the call when the anthropic key is missing', async () => {
    const router = new ModelRouter({ preset: 'anthropic', env: {} });

    await expect(router.call({ role: 'planner', systemPrompt: 's', userPrompt: 'u' })).rejects.toThrow(
      'Set ANTHROPIC_API_KEY environment variable'
    );
  });
});
