import { createHash } from 'node:crypto';

/**
 * Gravatar image URL for an email address
 * https://docs.gravatar.com/api/avatars/images/
 */
export function gravatarUrl(email: string): string {
  const hash = createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  return `https://www.gravatar.com/avatar/${hash}`;
}
