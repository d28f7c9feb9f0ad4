import { describe, it, expect } from 'vitest';
import { config } from '../config.js';
import { providerRegistrations } from '../runtime.js';

describe('providerRegistrations', () => {
  const llm = config.llm;

  it('registers the local providers and marks the configured default', () => {
    const registrations = providerRegistrations({
      ...llm,
      defaultProvider: 'lmstudio',
      openai: { ...llm.openai, apiKey: '' },
    });

    expect(registrations.map(r => [r.name, r.isDefault])).toEqual([
      ['ollama', false],
      ['lmstudio', true],
    ]);
  });

  it('adds openai only with an API key', () => {
    const registrations = providerRegistrations({
      ...llm,
      defaultProvider: 'openai',
      openai: { ...llm.openai, apiKey: 'test-secret', model: 'gpt-4o-mini' },
    });

    const openai = registrations.find(r => r.name === 'openai');
    expect(openai?.isDefault).toBe(true);
    expect(openai?.defaultModel).toBe('gpt-4o-mini');
  });

  it('falls back to ollama for an unknown default', () => {
    const registrations = providerRegistrations({
      ...llm,
      defaultProvider: 'openai',
      openai: { ...llm.openai, apiKey: '' },
    });

    expect(registrations.filter(r => r.isDefault).map(r => r.name)).toEqual(['ollama']);
  });
});
