/**
 * Logger tests
 *
 * The logger reads its configuration at import time, so each test stubs
 * the environment and imports a fresh module.
 *
 * @module utils/__tests__/logger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('createChildLogger', () => {
  beforeEach(() => {
    vi.resetModules();
    vi.stubEnv('LOG_LEVEL', 'info');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('binds the service name to the child', async () => {
    vi.stubEnv('LOG_SERVICES', '');
    const { createChildLogger } = await import('../logger');

    const child = createChildLogger({ service: 'Preference' });

    expect(child.level).toBe('info');
    expect(child.bindings()).toMatchObject({ service: 'Preference' });
  });

  it('silences services missing from LOG_SERVICES', async () => {
    vi.stubEnv('LOG_SERVICES', 'PreferenceBuilder');
    const { createChildLogger } = await import('../logger');

    expect(createChildLogger({ service: 'Preference' }).level).toBe('silent');
    expect(createChildLogger({ service: 'PreferenceBuilder' }).level).toBe('info');
  });
});
