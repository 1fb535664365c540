import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      providers: [],
      embedding: { kind: 'hashing', dimensions: 256 },
      database_path: 'outreach.db',
      max_concurrency: 4,
      batch_concurrency: 8,
      llm_max_retries: 2,
      llm_base_delay: 1,
      llm_timeout_ms: 120_000,
      visited_policy: 'exclude',
      log_events: true,
    });
  });

  it('enables providers by API key in priority order', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-openai',
      DEEPSEEK_API_KEY: 'test-deepseek',
      ANTHROPIC_API_KEY: 'test-anthropic',
      DEEPSEEK_MODEL: 'deepseek-reasoner',
      QWEN_API_KEY: '   ',
    });
    expect(config.providers.map((p) => p.kind)).toEqual(['anthropic', 'deepseek', 'openai']);
    expect(config.providers[1]).toEqual({
      kind: 'deepseek',
      api_key: 'test-deepseek',
      base_url: 'https://api.deepseek.com/v1',
      model: 'deepseek-reasoner',
    });
  });

  it('honours an explicit provider order', () => {
    const config = loadConfig({
      PROVIDER_ORDER: 'openai, anthropic,openai',
      OPENAI_API_KEY: 'test-openai',
      ANTHROPIC_API_KEY: 'test-anthropic',
      OPENROUTER_API_KEY: 'test-openrouter',
    });
    expect(config.providers.map((p) => p.kind)).toEqual(['openai', 'anthropic']);
  });

  it('rejects unknown providers in the order', () => {
    expect(() => loadConfig({ PROVIDER_ORDER: 'anthropic,gemini' }))
      .toThrow('PROVIDER_ORDER names unknown provider "gemini"');
  });

  it('uses OpenAI embeddings when an OpenAI key is present', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-openai', OPENAI_BASE_URL: 'http://localhost:9999/v1' });
    expect(config.embedding).toEqual({
      kind: 'openai',
      api_key: 'test-openai',
      base_url: 'http://localhost:9999/v1',
      model: 'text-embedding-3-small',
      dimensions: 1536,
    });
  });

  it('can force the hashing embedder', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-openai', EMBEDDING_PROVIDER: 'hashing', EMBEDDING_DIMENSIONS: '64' });
    expect(config.embedding).toEqual({ kind: 'hashing', dimensions: 64 });
  });

  it('requires a key for OpenAI embeddings', () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: 'openai' }))
      .toThrow('EMBEDDING_PROVIDER=openai needs OPENAI_API_KEY');
  });

  it('coerces numeric and boolean settings', () => {
    const config = loadConfig({
      MAX_CONCURRENCY: '2',
      BATCH_CONCURRENCY: '16',
      LLM_MAX_RETRIES: '0',
      LLM_BASE_DELAY: '0.5',
      LOG_EVENTS: 'no',
      VISITED_POLICY: 'penalize',
      RUN_DEADLINE: '2m',
      DATABASE_PATH: ':memory:',
    });
    expect(config).toMatchObject({
      max_concurrency: 2,
      batch_concurrency: 16,
      llm_max_retries: 0,
      llm_base_delay: 0.5,
      log_events: false,
      visited_policy: 'penalize',
      default_deadline: '2m',
      database_path: ':memory:',
    });
  });

  it('rejects malformed numeric settings', () => {
    expect(() => loadConfig({ MAX_CONCURRENCY: 'many' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ MAX_CONCURRENCY: '0' })).toThrow(/MAX_CONCURRENCY/);
    expect(() => loadConfig({ LLM_MAX_RETRIES: '1.5' })).toThrow(/LLM_MAX_RETRIES/);
  });

  it('rejects unknown enum values', () => {
    expect(() => loadConfig({ VISITED_POLICY: 'sometimes' })).toThrow(/VISITED_POLICY/);
    expect(() => loadConfig({ LOG_EVENTS: 'maybe' })).toThrow(/LOG_EVENTS/);
  });

  it('rejects a bad deadline', () => {
    expect(() => loadConfig({ RUN_DEADLINE: 'later' })).toThrow('RUN_DEADLINE: Invalid duration "later"');
    expect(() => loadConfig({ RUN_DEADLINE: '30d' })).toThrow(
      'RUN_DEADLINE: Duration "30d" exceeds the longest supported timer',
    );
  });
});
