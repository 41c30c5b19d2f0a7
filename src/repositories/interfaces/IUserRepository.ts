import { CreateUserInput, User } from '@/models';

/**
 * User Repository Interface
 * Defines the contract for user data access operations
 */
export interface IUserRepository {
  /**
   * @returns Promise resolving to User or null if not found
   */
  findUserByEmail(email: string): Promise<User | null>;

  /**
   * Insert an unconfirmed user
   * Rejects with a unique violation when the email is taken
   */
  createUser(input: CreateUserInput): Promise<User>;

  /**
   * Delete a user; contacts and contact channels go with it (ON DELETE CASCADE)
   * @returns the deleted row, or null if there was none
   */
  removeUserByEmail(email: string): Promise<User | null>;

  /**
   * Unconditionally replace the stored refresh token (login, logout)
   */
  updateRefreshToken(userId: number, refreshToken: string | null): Promise<void>;

  /**
   * Replace the stored refresh token only if it still equals `expected`
   * @returns false when another request rotated it first
   */
  rotateRefreshToken(userId: number, expected: string, next: string): Promise<boolean>;

  /**
   * @returns the updated user, or null if the email is unknown
   */
  updateAvatar(email: string, avatarUrl: string): Promise<User | null>;

  /**
   * Set confirmed = true
   * @returns the updated user, or null if the email is unknown
   */
  confirmEmail(email: string): Promise<User | null>;
}
