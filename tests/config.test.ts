import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

const SECRET = 'test-secret-test-secret-test-secret-0000';

describe('loadConfig', () => {
  it('should require JWT_SECRET', () => {
    expect(() => loadConfig({})).toThrow('Missing required environment variable: JWT_SECRET');
  });

  it('should default the session time to one day', () => {
    const config = loadConfig({ JWT_SECRET: SECRET });

    expect(config.jwt).toEqual({ secret: SECRET, sessionTimeSeconds: 86_400 });
  });

  it('should read an explicit session time', () => {
    const config = loadConfig({ JWT_SECRET: SECRET, JWT_SESSION_TIME: '3600' });

    expect(config.jwt.sessionTimeSeconds).toBe(3600);
  });

  it.each(['0', '-5', '1.5', 'abc'])('should reject a session time of %j', (value) => {
    expect(() => loadConfig({ JWT_SECRET: SECRET, JWT_SESSION_TIME: value })).toThrow(
      `JWT_SESSION_TIME must be a positive integer (seconds), got "${value}"`
    );
  });

  it('should leave optional services unset when not configured', () => {
    const config = loadConfig({ JWT_SECRET: SECRET });

    expect(config.supabase).toBeNull();
    expect(config.axiom).toBeNull();
  });

  it('should need both Supabase variables', () => {
    const partial = loadConfig({ JWT_SECRET: SECRET, SUPABASE_URL: 'http://localhost:54321' });
    const full = loadConfig({
      JWT_SECRET: SECRET,
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
    });

    expect(partial.supabase).toBeNull();
    expect(full.supabase).toEqual({
      url: 'http://localhost:54321',
      serviceRoleKey: 'test-service-key',
    });
  });

  it('should read Axiom settings', () => {
    const config = loadConfig({
      JWT_SECRET: SECRET,
      AXIOM_API_KEY: 'test-axiom-token',
      AXIOM_DATASET: 'conduit',
    });

    expect(config.axiom).toEqual({ apiToken: 'test-axiom-token', dataset: 'conduit' });
  });
});
