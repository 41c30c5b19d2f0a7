import { Queryable } from '@/config/database';
import { BirthdayWindow, Contact, ContactFilters, ContactInput } from '@/models';
import { IContactRepository } from './interfaces/IContactRepository';

// birthdate is formatted in SQL so pg never turns a DATE into a local-midnight Date
const CONTACT_COLUMNS = `
  c.id,
  c.first_name AS "firstName",
  c.last_name AS "lastName",
  to_char(c.birthdate, 'YYYY-MM-DD') AS birthdate,
  c.gender,
  c.persuasion,
  c.created_at AS "createdAt",
  c.created_by AS "createdBy"
`;

const RETURNING_COLUMNS = `
  id,
  first_name AS "firstName",
  last_name AS "lastName",
  to_char(birthdate, 'YYYY-MM-DD') AS birthdate,
  gender,
  persuasion,
  created_at AS "createdAt",
  created_by AS "createdBy"
`;

/**
 * Contact Repository
 * Handles all database operations for contacts
 */
export class ContactRepository implements IContactRepository {
  constructor(private readonly db: Queryable) {}

  /**
   * List the owner's contacts
   * Filters are exact matches combined with AND; email matches any channel value of the contact.
   */
  async findContacts(userId: number, filters: ContactFilters): Promise<Contact[]> {
    const conditions = ['c.created_by = $1'];
    const params: unknown[] = [userId];

    if (filters.firstName) {
      params.push(filters.firstName);
      conditions.push(`c.first_name = $${params.length}`);
    }

    if (filters.lastName) {
      params.push(filters.lastName);
      conditions.push(`c.last_name = $${params.length}`);
    }

    if (filters.email) {
      params.push(filters.email);
      conditions.push(`
        EXISTS (
          SELECT 1 FROM contacts_channels cc
          WHERE cc.contact_id = c.id AND cc.channel_value = $${params.length}
        )
      `);
    }

    const result = await this.db.query<Contact>(
      `
      SELECT ${CONTACT_COLUMNS}
      FROM contacts c
      WHERE ${conditions.join(' AND ')}
      ORDER BY c.id
      `,
      params
    );

    return result.rows;
  }

  async findBirthdays(userId: number, window: BirthdayWindow): Promise<Contact[]> {
    const result = await this.db.query<Contact>(
      `
      SELECT ${CONTACT_COLUMNS}
      FROM contacts c
      WHERE c.created_by = $1
        AND c.birthdate IS NOT NULL
        AND EXTRACT(MONTH FROM c.birthdate)::int = ANY($2::int[])
        AND EXTRACT(DAY FROM c.birthdate)::int = ANY($3::int[])
      ORDER BY c.id
      `,
      [userId, window.months, window.days]
    );

    return result.rows;
  }

  async findContactById(contactId: number, userId: number): Promise<Contact | null> {
    const result = await this.db.query<Contact>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts c WHERE c.id = $1 AND c.created_by = $2`,
      [contactId, userId]
    );

    return result.rows[0] || null;
  }

  async createContact(userId: number, input: ContactInput): Promise<Contact> {
    const result = await this.db.query<Contact>(
      `
      INSERT INTO contacts (first_name, last_name, birthdate, gender, persuasion, created_by)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${RETURNING_COLUMNS}
      `,
      [input.firstName, input.lastName, input.birthdate, input.gender, input.persuasion, userId]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO contacts returned no row');
    }
    return row;
  }

  async updateContact(contactId: number, userId: number, input: ContactInput): Promise<Contact | null> {
    const result = await this.db.query<Contact>(
      `
      UPDATE contacts
      SET first_name = $3,
          last_name = $4,
          birthdate = $5,
          gender = $6,
          persuasion = $7
      WHERE id = $1 AND created_by = $2
      RETURNING ${RETURNING_COLUMNS}
      `,
      [contactId, userId, input.firstName, input.lastName, input.birthdate, input.gender, input.persuasion]
    );

    return result.rows[0] || null;
  }

  async removeContact(contactId: number, userId: number): Promise<Contact | null> {
    const result = await this.db.query<Contact>(
      `DELETE FROM contacts WHERE id = $1 AND created_by = $2 RETURNING ${RETURNING_COLUMNS}`,
      [contactId, userId]
    );

    return result.rows[0] || null;
  }
}
