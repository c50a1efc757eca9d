import type Database from 'better-sqlite3';
import type { UserCredentials } from '../../domain/models.js';
import { ConflictError, ResourceNotFoundError } from '../../domain/errors/index.js';
import { isConstraintError } from '../db/index.js';
import type { IUserRepository, NewUser } from './IUserRepository.js';

interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  created_at: string;
}

const USER_COLUMNS = 'id, username, email, password_hash, created_at';

function toUser(row: UserRow): UserCredentials {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: new Date(row.created_at),
  };
}

export class SqliteUserRepository implements IUserRepository {
  constructor(private readonly db: Database.Database) {}

  findByUsername(username: string): UserCredentials | null {
    const row = this.db
      .prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = ?`)
      .get(username);
    return row ? toUser(row) : null;
  }

  findByEmail(email: string): UserCredentials | null {
    // the email column is declared COLLATE NOCASE
    const row = this.db
      .prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = ?`)
      .get(email);
    return row ? toUser(row) : null;
  }

  findById(id: number): UserCredentials | null {
    const row = this.db
      .prepare<[number], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = ?`)
      .get(id);
    return row ? toUser(row) : null;
  }

  create(input: NewUser): UserCredentials {
    try {
      const result = this.db
        .prepare<[string, string, string, string]>(
          'INSERT INTO users (username, email, password_hash, created_at) VALUES (?, ?, ?, ?)'
        )
        .run(input.username, input.email, input.passwordHash, new Date().toISOString());

      const user = this.findById(Number(result.lastInsertRowid));
      if (!user) throw new ResourceNotFoundError('User', Number(result.lastInsertRowid));
      return user;
    } catch (err) {
      if (isConstraintError(err, 'UNIQUE')) {
        throw new ConflictError('Username or email already registered.');
      }
      throw err;
    }
  }
}
