import { beforeEach, describe, expect, it, vi } from 'vitest';
import jwt from 'jsonwebtoken';

import { AuthService } from './auth-service.js';
import { InMemoryUserRepository } from '../test/memory-repositories.js';

const SECRET = 'test-secret';

const ALICE = {
  username: 'alice',
  email: 'alice@example.com',
  firstName: 'Alice',
  lastName: 'Liddell',
  password: 'test-password'
};

describe('AuthService', () => {
  let users: InMemoryUserRepository;
  let auth: AuthService;

  beforeEach(() => {
    users = new InMemoryUserRepository();
    auth = new AuthService({ users, jwtSecret: SECRET, jwtTtlSeconds: 3600, bcryptRounds: 4 });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('joins a new user and signs a token for them', async () => {
    const result = await auth.join(ALICE);

    expect(result.user).toEqual({
      id: result.user.id,
      username: 'alice',
      email: 'alice@example.com',
      firstName: 'Alice',
      lastName: 'Liddell'
    });
    expect(auth.verifyToken(result.token)).toEqual({ userId: result.user.id, username: 'alice' });

    const stored = await users.findByUsername('alice');
    expect(stored?.passwordHash).not.toBe('test-password');
  });

  it('refuses a taken username', async () => {
    await auth.join(ALICE);
    await expect(auth.join({ ...ALICE, email: 'other@example.com' })).rejects.toMatchObject({
      statusCode: 409,
      message: 'A user with that username already exists.'
    });
  });

  it('logs in with the right password', async () => {
    const { user } = await auth.join(ALICE);

    const result = await auth.login('alice', 'test-password');

    expect(result.user.id).toBe(user.id);
    expect(users.logins).toEqual([user.id]);
  });

  it.each([
    ['alice', 'wrong-password'],
    ['nobody', 'test-password']
  ])('refuses %s / %s', async (username, password) => {
    await auth.join(ALICE);
    await expect(auth.login(username, password)).rejects.toMatchObject({
      statusCode: 401,
      message: 'Invalid username or password.'
    });
  });

  it('refuses an inactive account', async () => {
    const { user } = await auth.join(ALICE);
    users.deactivate(user.id);

    await expect(auth.login('alice', 'test-password')).rejects.toMatchObject({
      statusCode: 403,
      message: 'Your account is not active.'
    });
    expect(await auth.getUser(user.id)).toBeNull();
  });

  it('rejects tokens signed with another secret or expired', () => {
    const foreign = jwt.sign({ username: 'alice' }, 'other-secret', { subject: 'user-1' });
    const expired = jwt.sign({ username: 'alice' }, SECRET, { subject: 'user-1', expiresIn: -10 });

    expect(auth.verifyToken(foreign)).toBeNull();
    expect(auth.verifyToken(expired)).toBeNull();
    expect(auth.verifyToken('not-a-token')).toBeNull();
  });

  it('authenticates a token only while its account is active', async () => {
    const { user, token } = await auth.join(ALICE);
    expect(await auth.authenticate(token)).toEqual(user);

    users.deactivate(user.id);
    expect(await auth.authenticate(token)).toBeNull();
  });

  it('does not authenticate a token for an unknown account', async () => {
    const orphan = jwt.sign({ username: 'ghost' }, SECRET, { subject: 'missing-user' });
    expect(await auth.authenticate(orphan)).toBeNull();
  });

  it('looks up profiles by id', async () => {
    const { user } = await auth.join(ALICE);
    expect(await auth.getUser(user.id)).toEqual(user);
    expect(await auth.getUser('missing')).toBeNull();
  });
});
