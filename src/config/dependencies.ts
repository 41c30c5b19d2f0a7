/**
 * Dependency Container
 * Wires repositories and services around the lifetime-scoped handles
 *
 * server.ts creates the database pool and the cache / limiter stores once at
 * startup and passes them in; tests pass in-memory stand-ins through the same seam.
 */

import { RequestHandler } from 'express';
import { Store } from 'express-rate-limit';
import { Queryable } from '@/config/database';
import { ICacheStore } from '@/interfaces/ICacheStore';
import { IMailer } from '@/interfaces/IMailer';
import { IAvatarStorage } from '@/interfaces/IAvatarStorage';
import {
  IChannelRepository,
  IContactChannelRepository,
  IContactRepository,
  IUserRepository,
} from '@/repositories/interfaces';

// Repository implementations
import { UserRepository } from '@/repositories/user.repository';
import { ContactRepository } from '@/repositories/contact.repository';
import { ChannelRepository } from '@/repositories/channel.repository';
import { ContactChannelRepository } from '@/repositories/contactChannel.repository';

// Service implementations
import { CredentialService } from '@/services/credential.service';
import { TokenService } from '@/services/token.service';
import { UserCacheService } from '@/services/userCache.service';
import { AuthService } from '@/services/auth.service';
import { ContactService } from '@/services/contact.service';
import { ChannelService } from '@/services/channel.service';
import { ContactChannelService } from '@/services/contactChannel.service';

import { rateLimiterFromConfig } from '@/middlewares/rateLimiter';

export interface Repositories {
  userRepository: IUserRepository;
  contactRepository: IContactRepository;
  channelRepository: IChannelRepository;
  contactChannelRepository: IContactChannelRepository;
}

export interface AppDependencies {
  authService: AuthService;
  contactService: ContactService;
  channelService: ChannelService;
  contactChannelService: ContactChannelService;
  /** Per-route limiter mounted in front of every protected route */
  rateLimiter: RequestHandler;
}

export interface ServiceOptions {
  repositories: Repositories;
  cache: ICacheStore;
  mailer: IMailer;
  avatarStorage: IAvatarStorage;
  rateLimiter: RequestHandler;
  credentialService?: CredentialService;
  tokenService?: TokenService;
}

export function createRepositories(db: Queryable): Repositories {
  return {
    userRepository: new UserRepository(db),
    contactRepository: new ContactRepository(db),
    channelRepository: new ChannelRepository(db),
    contactChannelRepository: new ContactChannelRepository(db),
  };
}

export function createServices(options: ServiceOptions): AppDependencies {
  const { repositories, cache, mailer, avatarStorage } = options;

  const userCacheService = new UserCacheService(cache, repositories.userRepository);

  const authService = new AuthService(
    repositories.userRepository,
    userCacheService,
    options.credentialService ?? new CredentialService(),
    options.tokenService ?? new TokenService(),
    mailer,
    avatarStorage
  );

  return {
    authService,
    contactService: new ContactService(repositories.contactRepository),
    channelService: new ChannelService(repositories.channelRepository),
    contactChannelService: new ContactChannelService(
      repositories.contactChannelRepository,
      repositories.contactRepository,
      repositories.channelRepository
    ),
    rateLimiter: options.rateLimiter,
  };
}

export interface RuntimeHandles {
  db: Queryable;
  cache: ICacheStore;
  mailer: IMailer;
  avatarStorage: IAvatarStorage;
  /** Shared limiter store; the library's memory store when omitted */
  rateLimitStore?: Store;
}

/**
 * Production wiring: pg repositories and the configured rate limit
 */
export function buildDependencies(handles: RuntimeHandles): AppDependencies {
  return createServices({
    repositories: createRepositories(handles.db),
    cache: handles.cache,
    mailer: handles.mailer,
    avatarStorage: handles.avatarStorage,
    rateLimiter: rateLimiterFromConfig(handles.rateLimitStore),
  });
}
