import { Queryable } from '@/config/database';
import { Channel, ChannelInput } from '@/models';
import { IChannelRepository } from './interfaces/IChannelRepository';

/**
 * Channel Repository
 * Handles all database operations for channels
 */
export class ChannelRepository implements IChannelRepository {
  constructor(private readonly db: Queryable) {}

  async findChannels(): Promise<Channel[]> {
    const result = await this.db.query<Channel>('SELECT id, name FROM channels ORDER BY id');
    return result.rows;
  }

  async findChannelById(channelId: number): Promise<Channel | null> {
    const result = await this.db.query<Channel>('SELECT id, name FROM channels WHERE id = $1', [channelId]);
    return result.rows[0] || null;
  }

  async findChannelByName(name: string): Promise<Channel | null> {
    const result = await this.db.query<Channel>('SELECT id, name FROM channels WHERE name = $1', [name]);
    return result.rows[0] || null;
  }

  async createChannel(input: ChannelInput): Promise<Channel> {
    const result = await this.db.query<Channel>(
      'INSERT INTO channels (name) VALUES ($1) RETURNING id, name',
      [input.name]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO channels returned no row');
    }
    return row;
  }

  async updateChannel(channelId: number, input: ChannelInput): Promise<Channel | null> {
    const result = await this.db.query<Channel>(
      'UPDATE channels SET name = $2 WHERE id = $1 RETURNING id, name',
      [channelId, input.name]
    );

    return result.rows[0] || null;
  }

  async removeChannel(channelId: number): Promise<Channel | null> {
    const result = await this.db.query<Channel>(
      'DELETE FROM channels WHERE id = $1 RETURNING id, name',
      [channelId]
    );

    return result.rows[0] || null;
  }
}
