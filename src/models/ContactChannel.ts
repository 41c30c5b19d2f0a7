/**
 * Contact channel model
 * Matches the 'contacts_channels' table schema
 *
 * channelValue is unique across all users (an address or number can belong to one contact only).
 */
export interface ContactChannel {
  id: number;
  contactId: number;
  channelId: number;
  channelValue: string;
  createdBy: number;
}

export interface ContactChannelInput {
  contactId: number;
  channelId: number;
  channelValue: string;
}

export interface Pagination {
  skip: number;
  limit: number;
}

/**
 * Outcome of creating a contact channel
 * A taken value or a missing contact / channel is an expected result, not an exception.
 */
export type CreateContactChannelResult =
  | { status: 'created'; contactChannel: ContactChannel }
  | { status: 'conflict' }
  | { status: 'not_found' };
