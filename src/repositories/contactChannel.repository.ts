import { Queryable } from '@/config/database';
import { ContactChannel, ContactChannelInput, Pagination } from '@/models';
import { IContactChannelRepository } from './interfaces/IContactChannelRepository';

const CONTACT_CHANNEL_COLUMNS = `
  id,
  contact_id AS "contactId",
  channel_id AS "channelId",
  channel_value AS "channelValue",
  created_by AS "createdBy"
`;

/**
 * Contact Channel Repository
 * Handles all database operations for contacts_channels
 */
export class ContactChannelRepository implements IContactChannelRepository {
  constructor(private readonly db: Queryable) {}

  async findContactChannels(userId: number, pagination: Pagination): Promise<ContactChannel[]> {
    const result = await this.db.query<ContactChannel>(
      `
      SELECT ${CONTACT_CHANNEL_COLUMNS}
      FROM contacts_channels
      WHERE created_by = $1
      ORDER BY id
      OFFSET $2
      LIMIT $3
      `,
      [userId, pagination.skip, pagination.limit]
    );

    return result.rows;
  }

  async findContactChannelById(contactChannelId: number, userId: number): Promise<ContactChannel | null> {
    const result = await this.db.query<ContactChannel>(
      `SELECT ${CONTACT_CHANNEL_COLUMNS} FROM contacts_channels WHERE id = $1 AND created_by = $2`,
      [contactChannelId, userId]
    );

    return result.rows[0] || null;
  }

  async findContactChannelByValue(channelValue: string): Promise<ContactChannel | null> {
    const result = await this.db.query<ContactChannel>(
      `SELECT ${CONTACT_CHANNEL_COLUMNS} FROM contacts_channels WHERE channel_value = $1`,
      [channelValue]
    );

    return result.rows[0] || null;
  }

  async createContactChannel(userId: number, input: ContactChannelInput): Promise<ContactChannel> {
    const result = await this.db.query<ContactChannel>(
      `
      INSERT INTO contacts_channels (contact_id, channel_id, channel_value, created_by)
      VALUES ($1, $2, $3, $4)
      RETURNING ${CONTACT_CHANNEL_COLUMNS}
      `,
      [input.contactId, input.channelId, input.channelValue, userId]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO contacts_channels returned no row');
    }
    return row;
  }

  async updateContactChannel(
    contactChannelId: number,
    userId: number,
    input: ContactChannelInput
  ): Promise<ContactChannel | null> {
    const result = await this.db.query<ContactChannel>(
      `
      UPDATE contacts_channels
      SET contact_id = $3,
          channel_id = $4,
          channel_value = $5
      WHERE id = $1 AND created_by = $2
      RETURNING ${CONTACT_CHANNEL_COLUMNS}
      `,
      [contactChannelId, userId, input.contactId, input.channelId, input.channelValue]
    );

    return result.rows[0] || null;
  }

  async removeContactChannel(contactChannelId: number, userId: number): Promise<ContactChannel | null> {
    const result = await this.db.query<ContactChannel>(
      `DELETE FROM contacts_channels WHERE id = $1 AND created_by = $2 RETURNING ${CONTACT_CHANNEL_COLUMNS}`,
      [contactChannelId, userId]
    );

    return result.rows[0] || null;
  }
}
