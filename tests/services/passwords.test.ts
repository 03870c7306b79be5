import { describe, it, expect } from 'vitest';
import { hashPassword, verifyPassword } from '../../src/services/passwords.js';

describe('passwords', () => {
  it('should produce a salted scrypt hash', async () => {
    const stored = await hashPassword('correct horse');

    expect(stored).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
    expect(stored).not.toContain('correct horse');
  });

  it('should salt each hash differently', async () => {
    const a = await hashPassword('same-password');
    const b = await hashPassword('same-password');

    expect(a).not.toBe(b);
  });

  it('should verify the right password', async () => {
    const stored = await hashPassword('correct horse');

    expect(await verifyPassword('correct horse', stored)).toBe(true);
  });

  it('should reject the wrong password', async () => {
    const stored = await hashPassword('correct horse');

    expect(await verifyPassword('battery staple', stored)).toBe(false);
  });

  it.each(['', 'plain-text', 'bcrypt$abc$def', 'scrypt$00ff$abcd'])(
    'should reject a stored value of %j',
    async (stored) => {
      expect(await verifyPassword('anything', stored)).toBe(false);
    }
  );
});
