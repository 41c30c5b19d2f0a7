import { Queryable } from '@/config/database';
import { CreateUserInput, User } from '@/models';
import { IUserRepository } from './interfaces/IUserRepository';

const USER_COLUMNS = `
  id,
  email,
  password,
  confirmed,
  avatar,
  refresh_token AS "refreshToken",
  created_at AS "createdAt"
`;

/**
 * User Repository
 * Handles all database operations for users
 */
export class UserRepository implements IUserRepository {
  constructor(private readonly db: Queryable) {}

  async findUserByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<User>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );

    return result.rows[0] || null;
  }

  async createUser(input: CreateUserInput): Promise<User> {
    const result = await this.db.query<User>(
      `
      INSERT INTO users (email, password, avatar)
      VALUES ($1, $2, $3)
      RETURNING ${USER_COLUMNS}
      `,
      [input.email, input.passwordHash, input.avatar]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO users returned no row');
    }
    return row;
  }

  async removeUserByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<User>(
      `DELETE FROM users WHERE email = $1 RETURNING ${USER_COLUMNS}`,
      [email]
    );

    return result.rows[0] || null;
  }

  async updateRefreshToken(userId: number, refreshToken: string | null): Promise<void> {
    await this.db.query('UPDATE users SET refresh_token = $2 WHERE id = $1', [userId, refreshToken]);
  }

  /**
   * Compare-and-swap on the stored token
   * Two concurrent refreshes with the same token: exactly one row update succeeds.
   */
  async rotateRefreshToken(userId: number, expected: string, next: string): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE users SET refresh_token = $3 WHERE id = $1 AND refresh_token = $2',
      [userId, expected, next]
    );

    return result.rowCount === 1;
  }

  async updateAvatar(email: string, avatarUrl: string): Promise<User | null> {
    const result = await this.db.query<User>(
      `UPDATE users SET avatar = $2 WHERE email = $1 RETURNING ${USER_COLUMNS}`,
      [email, avatarUrl]
    );

    return result.rows[0] || null;
  }

  async confirmEmail(email: string): Promise<User | null> {
    const result = await this.db.query<User>(
      `UPDATE users SET confirmed = TRUE WHERE email = $1 RETURNING ${USER_COLUMNS}`,
      [email]
    );

    return result.rows[0] || null;
  }
}
