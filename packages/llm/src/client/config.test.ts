import { describe, it, expect } from 'vitest';
import { detectProviders } from './config.js';

describe('detectProviders', () => {
  it('returns nothing for an empty environment', () => {
    expect(detectProviders({})).toEqual({});
  });

  it('picks up the Ollama host', () => {
    expect(detectProviders({ OLLAMA_HOST: 'http://gpu-box:11434' })).toEqual({
      ollama: { baseUrl: 'http://gpu-box:11434' },
    });
  });

  it('merges several variables into one provider entry', () => {
    const providers = detectProviders({
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(providers).toEqual({
      'openai-compatible': { baseUrl: 'http://localhost:8080/v1', apiKey: 'test-secret' },
    });
  });

  it('ignores empty values', () => {
    expect(detectProviders({ OLLAMA_HOST: '', OPENAI_API_KEY: '' })).toEqual({});
  });
});
