/**
 * Contact model
 * Matches the 'contacts' table schema
 *
 * birthdate is a calendar date serialized as YYYY-MM-DD (no time zone).
 */
export interface Contact {
  id: number;
  firstName: string;
  lastName: string;
  birthdate: string | null;
  gender: string;
  persuasion: string | null;
  createdAt: Date;
  createdBy: number;
}

/**
 * Contact body for create and full update (PUT)
 */
export interface ContactInput {
  firstName: string;
  lastName: string;
  birthdate: string | null;
  gender: string;
  persuasion: string | null;
}

/**
 * Optional list filters, combined with AND
 * email matches any contact-channel value of the contact
 */
export interface ContactFilters {
  firstName?: string;
  lastName?: string;
  email?: string;
}

/**
 * Coarse birthday filter produced by futureWindow()
 */
export interface BirthdayWindow {
  months: number[];
  days: number[];
}
