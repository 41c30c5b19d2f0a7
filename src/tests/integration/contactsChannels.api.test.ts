import request from 'supertest';
import { buildTestApp, registerAndLogin, TestContext } from '@/tests/utils/testApp';

describe('Contacts channels API', () => {
  let ctx: TestContext;
  let token: string;
  let contactId: number;

  function post(body: object, accessToken: string = token) {
    return request(ctx.app).post('/api/contactsChannels').set('Authorization', `Bearer ${accessToken}`).send(body);
  }

  beforeEach(async () => {
    ctx = buildTestApp();
    token = await registerAndLogin(ctx, 'alice@example.com');

    await request(ctx.app)
      .post('/api/channels')
      .set('Authorization', `Bearer ${token}`)
      .send({ name: 'email' })
      .expect(200);
    const contact = await request(ctx.app)
      .post('/api/contacts')
      .set('Authorization', `Bearer ${token}`)
      .send({ firstName: 'Bob', lastName: 'Stone', gender: 'M' })
      .expect(200);
    contactId = contact.body.id;
  });

  describe('POST /api/contactsChannels', () => {
    it('should link a contact to a channel', async () => {
      const response = await post({ contactId, channelId: 1, channelValue: 'bob@example.com' }).expect(200);

      expect(response.body).toEqual({
        id: 1,
        contactId,
        channelId: 1,
        channelValue: 'bob@example.com',
        createdBy: 1,
      });
    });

    it('should reject a value already used by any user', async () => {
      await post({ contactId, channelId: 1, channelValue: 'bob@example.com' }).expect(200);
      const otherToken = await registerAndLogin(ctx, 'carol@example.com');
      const otherContact = await request(ctx.app)
        .post('/api/contacts')
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ firstName: 'Bobby', lastName: 'Stone', gender: 'M' })
        .expect(200);

      const response = await post(
        { contactId: otherContact.body.id, channelId: 1, channelValue: 'bob@example.com' },
        otherToken
      ).expect(409);

      expect(response.body.error.message).toBe('Such channel value already exists in the DB');
    });

    it('should not link a contact owned by another user', async () => {
      const otherToken = await registerAndLogin(ctx, 'carol@example.com');

      const response = await post({ contactId, channelId: 1, channelValue: 'bob@example.com' }, otherToken).expect(
        404
      );

      expect(response.body.error.message).toBe('Contact or channel name is not found');
      expect(ctx.db.contactChannels).toEqual([]);
    });

    it('should reject an unknown channel', async () => {
      await post({ contactId, channelId: 7, channelValue: 'bob@example.com' }).expect(404);
    });

    it('should reject a body without a value', async () => {
      await post({ contactId, channelId: 1 }).expect(422);
    });

    it('should reject ids beyond the integer column range', async () => {
      const response = await post({ contactId: 2_147_483_648, channelId: 1, channelValue: 'bob@example.com' }).expect(
        422
      );

      expect(response.body.error.message).toBe('Invalid contact channel data');
      expect(ctx.db.contactChannels).toEqual([]);
    });
  });

  describe('GET /api/contactsChannels', () => {
    beforeEach(async () => {
      for (const value of ['a@example.com', 'b@example.com', 'c@example.com']) {
        await post({ contactId, channelId: 1, channelValue: value }).expect(200);
      }
    });

    it('should page with skip and limit', async () => {
      const response = await request(ctx.app)
        .get('/api/contactsChannels?skip=1&limit=1')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(response.body.map((cc: { channelValue: string }) => cc.channelValue)).toEqual(['b@example.com']);
    });

    it('should default to the first 100 records', async () => {
      const response = await request(ctx.app)
        .get('/api/contactsChannels')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(response.body).toHaveLength(3);
    });

    it('should reject a limit over 100', async () => {
      const response = await request(ctx.app)
        .get('/api/contactsChannels?limit=101')
        .set('Authorization', `Bearer ${token}`)
        .expect(422);

      expect(response.body.error.details.fieldErrors.limit).toEqual(['limit cannot exceed 100']);
    });

    it('should list only the caller records', async () => {
      const otherToken = await registerAndLogin(ctx, 'carol@example.com');

      const response = await request(ctx.app)
        .get('/api/contactsChannels')
        .set('Authorization', `Bearer ${otherToken}`)
        .expect(200);

      expect(response.body).toEqual([]);
    });
  });

  describe('PUT /api/contactsChannels/:contactChannelId', () => {
    it('should change the value', async () => {
      await post({ contactId, channelId: 1, channelValue: 'bob@example.com' }).expect(200);

      const response = await request(ctx.app)
        .put('/api/contactsChannels/1')
        .set('Authorization', `Bearer ${token}`)
        .send({ contactId, channelId: 1, channelValue: 'bob@work.example.com' })
        .expect(200);

      expect(response.body.channelValue).toBe('bob@work.example.com');
    });

    it('should answer 404 for a record of another user', async () => {
      await post({ contactId, channelId: 1, channelValue: 'bob@example.com' }).expect(200);
      const otherToken = await registerAndLogin(ctx, 'carol@example.com');

      const response = await request(ctx.app)
        .put('/api/contactsChannels/1')
        .set('Authorization', `Bearer ${otherToken}`)
        .send({ contactId, channelId: 1, channelValue: 'x@example.com' })
        .expect(404);

      expect(response.body.error.message).toBe('Contact channel 1 is not found');
    });
  });

  describe('DELETE /api/contactsChannels/:contactChannelId', () => {
    it('should remove the record once', async () => {
      await post({ contactId, channelId: 1, channelValue: 'bob@example.com' }).expect(200);

      await request(ctx.app).delete('/api/contactsChannels/1').set('Authorization', `Bearer ${token}`).expect(200);
      await request(ctx.app).delete('/api/contactsChannels/1').set('Authorization', `Bearer ${token}`).expect(404);
    });

    it('should not remove a record of another user', async () => {
      await post({ contactId, channelId: 1, channelValue: 'bob@example.com' }).expect(200);
      const otherToken = await registerAndLogin(ctx, 'carol@example.com');

      await request(ctx.app)
        .delete('/api/contactsChannels/1')
        .set('Authorization', `Bearer ${otherToken}`)
        .expect(404);

      expect(ctx.db.contactChannels.map((record) => record.channelValue)).toEqual(['bob@example.com']);
    });
  });
});
