/**
 * User model
 * Matches the 'users' table schema
 *
 * password holds the argon2 hash, never the plain text.
 * refreshToken is the single active refresh token (null when logged out or never logged in).
 */
export interface User {
  id: number;
  email: string;
  password: string;
  confirmed: boolean;
  avatar: string | null;
  refreshToken: string | null;
  createdAt: Date;
}

/**
 * User creation input
 * Used by signup after the password has been hashed
 */
export interface CreateUserInput {
  email: string;
  passwordHash: string;
  avatar: string | null;
}

/**
 * Public projection returned by the API
 */
export interface UserDto {
  id: number;
  email: string;
  avatar: string | null;
  confirmed: boolean;
  createdAt: Date;
}

export function toUserDto(user: User): UserDto {
  return {
    id: user.id,
    email: user.email,
    avatar: user.avatar,
    confirmed: user.confirmed,
    createdAt: user.createdAt,
  };
}
