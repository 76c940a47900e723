import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/config';
import { createServices } from '../services';
import { silentLogger } from './__mocks__/fixtures';

describe('createServices', () => {
  it('starts with the default configuration and no search credentials', () => {
    const services = createServices(loadConfig({}), silentLogger);

    expect(services.integrator.enabled).toBe(false);
    expect(services.integrator.providerName).toBe('none');
    expect(services.router.supportedLanguages()).toEqual(['hindi', 'telugu', 'marathi', 'english']);
    expect(services.stats.kind).toBe('memory');
    expect(services.kb.size).toBe(29);
  });

  it('uses the configured provider when its key is present', () => {
    const services = createServices(loadConfig({ SEARCH_PROVIDER: 'serper', SERPER_API_KEY: 'test-key' }), silentLogger);
    expect(services.integrator.providerName).toBe('serper');
  });
});
