/**
 * Token pair returned by login and refresh
 * Field names follow the OAuth2 token response
 */
export interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
}

export type TokenType = 'access' | 'refresh';

/**
 * Verified claims of an access or refresh token
 */
export interface TokenClaims {
  sub: string;
  type: TokenType;
  iat: number;
  exp: number;
  jti: string;
}
