/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IUserRepository';
export * from './IContactRepository';
export * from './IChannelRepository';
export * from './IContactChannelRepository';
