/**
 * Central export point for all models
 * Allows clean imports: import { Contact, User } from '@/models'
 */

export * from './User';
export * from './Token';
export * from './Contact';
export * from './Channel';
export * from './ContactChannel';
