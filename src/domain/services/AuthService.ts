import type { Logger } from 'pino';
import type { RegisterRequest, User, UserCredentials } from '../models.js';
import type { IUserRepository } from '../../infrastructure/repositories/IUserRepository.js';
import type { IPasswordHasher } from '../../infrastructure/security/IPasswordHasher.js';
import { AuthError, ConflictError, ValidationError } from '../errors/index.js';

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function toPublicUser(user: UserCredentials): User {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    createdAt: user.createdAt,
  };
}

export class AuthService {
  // verified against when no account matches, so both failures cost one hash
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly users: IUserRepository,
    private readonly hasher: IPasswordHasher,
    private readonly logger: Logger
  ) {}

  async register(request: RegisterRequest): Promise<User> {
    const username = request.username.trim();
    const email = request.email.trim().toLowerCase();

    const blank = (
      [
        ['username', username],
        ['email', email],
        ['password', request.password],
        ['confirm_password', request.confirm_password],
      ] as const
    )
      .filter(([, value]) => value === '')
      .map(([field]) => field);
    if (blank.length > 0) {
      throw new ValidationError(`Missing required fields: ${blank.join(', ')}`, blank);
    }

    if (!EMAIL_RE.test(email)) {
      throw new ValidationError('Enter a valid email address.', ['email']);
    }
    if (request.password !== request.confirm_password) {
      throw new ValidationError('Passwords do not match', ['confirm_password']);
    }
    if (this.users.findByUsername(username)) {
      throw new ValidationError('Username already taken', ['username']);
    }
    if (this.users.findByEmail(email)) {
      throw new ValidationError('Email already registered', ['email']);
    }

    const passwordHash = await this.hasher.hash(request.password);

    try {
      const user = this.users.create({ username, email, passwordHash });
      this.logger.info({ userId: user.id, username }, 'user registered');
      return toPublicUser(user);
    } catch (err) {
      // lost a race with a concurrent registration while hashing
      if (err instanceof ConflictError) {
        throw new ValidationError(err.message, ['username', 'email']);
      }
      throw err;
    }
  }

  async login(usernameOrEmail: string, password: string): Promise<User> {
    const user = this.resolveAccount(usernameOrEmail);
    const valid = user
      ? await this.hasher.verify(password, user.passwordHash)
      : await this.verifyAgainstDummy(password);

    if (!user || !valid) {
      this.logger.warn({ identifier: usernameOrEmail }, 'failed login attempt');
      throw new AuthError();
    }

    this.logger.info({ userId: user.id }, 'user logged in');
    return toPublicUser(user);
  }

  private async verifyAgainstDummy(password: string): Promise<false> {
    this.dummyHash ??= this.hasher.hash('no-such-account');
    await this.hasher.verify(password, await this.dummyHash);
    return false;
  }

  // username first, then email
  resolveAccount(usernameOrEmail: string): UserCredentials | null {
    const identifier = usernameOrEmail.trim();
    if (identifier === '') return null;

    return (
      this.users.findByUsername(identifier) ??
      this.users.findByEmail(identifier.toLowerCase())
    );
  }

  findUser(userId: number): User | null {
    const user = this.users.findById(userId);
    return user ? toPublicUser(user) : null;
  }
}
