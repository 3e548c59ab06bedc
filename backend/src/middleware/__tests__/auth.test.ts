import { describe, it, expect } from '@jest/globals';
import bcrypt from 'bcryptjs';
import { checkPassword, resolveActor } from '../auth';
import type { AuthOptions } from '../auth';
import { HttpError } from '../errorHandler';

const teamHash = bcrypt.hashSync('team-secret', 4);

const options: AuthOptions = {
  adminPassword: 'test-secret',
  findCredentials: async (username) =>
    username === 'hotel' ? { teamId: 'team-hotel', passwordHash: teamHash } : null,
};

async function rejection(promise: Promise<unknown>): Promise<HttpError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HttpError) return error;
    throw error;
  }
  throw new Error('expected an HttpError');
}

describe('checkPassword', () => {
  it('compares plaintext or bcrypt hashes', async () => {
    expect(await checkPassword('test-secret', 'test-secret')).toBe(true);
    expect(await checkPassword('other', 'test-secret')).toBe(false);
    expect(await checkPassword('team-secret', teamHash)).toBe(true);
    expect(await checkPassword('other', teamHash)).toBe(false);
  });
});

describe('resolveActor', () => {
  it('recognises the admin', async () => {
    expect(await resolveActor({ adminPassword: 'test-secret' }, options)).toEqual({ role: 'admin' });
  });

  it('prefers admin credentials when both are sent', async () => {
    const actor = await resolveActor(
      { adminPassword: 'test-secret', teamUsername: 'hotel', teamPassword: 'team-secret' },
      options
    );
    expect(actor).toEqual({ role: 'admin' });
  });

  it('recognises a team', async () => {
    expect(await resolveActor({ teamUsername: 'hotel', teamPassword: 'team-secret' }, options)).toEqual({
      role: 'team',
      teamId: 'team-hotel',
    });
  });

  it('returns null when nothing was sent', async () => {
    expect(await resolveActor({}, options)).toBeNull();
  });

  it('turns bad credentials into 401s', async () => {
    const cases: Array<[Parameters<typeof resolveActor>[0], string]> = [
      [{ adminPassword: 'wrong' }, 'Incorrect admin password'],
      [{ teamUsername: 'hotel' }, 'Team password required'],
      [{ teamUsername: 'hotel', teamPassword: 'wrong' }, 'Incorrect username or password'],
      [{ teamUsername: 'nobody', teamPassword: 'team-secret' }, 'Incorrect username or password'],
    ];

    for (const [headers, message] of cases) {
      const error = await rejection(resolveActor(headers, options));
      expect([error.statusCode, error.code, error.message]).toEqual([401, 'UNAUTHORIZED', message]);
    }
  });

  it('refuses admin access when no admin password is configured', async () => {
    const error = await rejection(resolveActor({ adminPassword: '' }, { ...options, adminPassword: '' }));
    expect(error.message).toBe('Admin access is not configured');
  });
});
