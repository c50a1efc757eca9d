import type { UserCredentials } from '../../domain/models.js';

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
}

export interface IUserRepository {
  findByUsername(username: string): UserCredentials | null;
  // case-insensitive
  findByEmail(email: string): UserCredentials | null;
  findById(id: number): UserCredentials | null;
  // fails with ConflictError when the username or email is taken
  create(input: NewUser): UserCredentials;
}
