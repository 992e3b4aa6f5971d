import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import type { AuthResult, UserProfile } from '@chessboard/shared';
import type { UserRecord, UserRepository } from '../db/user-repository.js';
import { AppError } from '../lib/errors.js';

interface AuthServiceDeps {
  users: UserRepository;
  jwtSecret: string;
  jwtTtlSeconds: number;
  bcryptRounds: number;
}

export interface JoinInput {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  password: string;
}

export interface TokenPayload {
  userId: string;
  username: string;
}

function toProfile(user: UserRecord): UserProfile {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName
  };
}

export class AuthService {
  private readonly users: UserRepository;
  private readonly jwtSecret: string;
  private readonly jwtTtlSeconds: number;
  private readonly bcryptRounds: number;

  constructor({ users, jwtSecret, jwtTtlSeconds, bcryptRounds }: AuthServiceDeps) {
    this.users = users;
    this.jwtSecret = jwtSecret;
    this.jwtTtlSeconds = jwtTtlSeconds;
    this.bcryptRounds = bcryptRounds;
  }

  async join(input: JoinInput): Promise<AuthResult> {
    const passwordHash = await bcrypt.hash(input.password, this.bcryptRounds);

    const user = await this.users.create({
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      passwordHash
    });

    if (!user) {
      throw new AppError('A user with that username already exists.', 409, 'UsernameTaken');
    }

    console.log(`[AuthService] New user ${user.username}`);
    return { user: toProfile(user), token: this.generateToken(user) };
  }

  async login(username: string, password: string): Promise<AuthResult> {
    const user = await this.users.findByUsername(username);
    const valid = user ? await bcrypt.compare(password, user.passwordHash) : false;

    if (!user || !valid) {
      throw new AppError('Invalid username or password.', 401, 'InvalidCredentials');
    }
    if (!user.isActive) {
      throw new AppError('Your account is not active.', 403, 'InactiveAccount');
    }

    await this.users.recordLogin(user.id);
    return { user: toProfile(user), token: this.generateToken(user) };
  }

  async getUser(id: string): Promise<UserProfile | null> {
    const user = await this.users.findById(id);
    return user && user.isActive ? toProfile(user) : null;
  }

  /** The active account a token was issued to, or null. */
  async authenticate(token: string): Promise<UserProfile | null> {
    const payload = this.verifyToken(token);
    return payload ? this.getUser(payload.userId) : null;
  }

  verifyToken(token: string): TokenPayload | null {
    try {
      const payload = jwt.verify(token, this.jwtSecret);
      if (typeof payload === 'string' || typeof payload.sub !== 'string') {
        return null;
      }
      const username = typeof payload.username === 'string' ? payload.username : '';
      return { userId: payload.sub, username };
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        return null;
      }
      throw error;
    }
  }

  private generateToken(user: UserRecord): string {
    return jwt.sign({ username: user.username }, this.jwtSecret, {
      subject: user.id,
      expiresIn: this.jwtTtlSeconds
    });
  }
}
