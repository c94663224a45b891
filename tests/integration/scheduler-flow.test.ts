import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createTestLab } from '../fixtures/lab.js';
import { basicAuth, startRequestBody } from '../fixtures/start-request.js';

const SESSIONS = '/weblab/sessions';

describe('Scheduler flow (Integration)', () => {
  describe('authentication', () => {
    it('answers the API version without credentials', async () => {
      const { app } = createTestLab();
      const res = await request(app).get(`${SESSIONS}/api`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ api_version: '1' });
    });

    it('validates credentials on /test', async () => {
      const { app } = createTestLab();
      const res = await request(app).get(`${SESSIONS}/test`).set('Authorization', basicAuth());

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ valid: true });
    });

    it('explains a missing username on /test', async () => {
      const { app } = createTestLab();
      const res = await request(app).get(`${SESSIONS}/test`);

      expect(res.status).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Basic realm="Login Required"');
      expect(res.body).toEqual({ valid: false, error_messages: ['Invalid credentials: no username provided'] });
    });

    it('explains wrong credentials on /test', async () => {
      const { app } = createTestLab();
      const res = await request(app).get(`${SESSIONS}/test`).set('Authorization', basicAuth('scheduler', 'wrong'));

      expect(res.status).toBe(401);
      expect(res.body.error_messages).toEqual([
        'Invalid credentials: wrong username provided. Check the lab logs for further information.',
      ]);
    });

    it('rejects other routes without credentials', async () => {
      const { app } = createTestLab();
      const res = await request(app).post(`${SESSIONS}/`).send(startRequestBody());

      expect(res.status).toBe(401);
      expect(res.text).toBe("You don't seem to be a WebLab-Instance");
    });

    it('cannot be set up with an empty credential pair', () => {
      expect(() => createTestLab({ settings: { username: '', password: '' } })).toThrow(
        'Invalid configuration. Missing WEBLAB_USERNAME',
      );
    });

    it('honours the base URL', async () => {
      const { app } = createTestLab({ settings: { baseUrl: '/labs/robot' } });

      expect((await request(app).get(`/labs/robot${SESSIONS}/api`)).status).toBe(200);
      expect((await request(app).get(`${SESSIONS}/api`)).status).toBe(404);
    });
  });

  describe('session lifecycle', () => {
    it('creates a session and answers its callback URL', async () => {
      const { app, weblab } = createTestLab();
      const res = await request(app).post(`${SESSIONS}/`).set('Authorization', basicAuth()).send(startRequestBody());

      expect(res.status).toBe(200);
      expect(res.body.url).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/callback\/[A-Za-z0-9_]{43}$/);
      expect(res.body.url.endsWith(`/${res.body.session_id}`)).toBe(true);
      expect(await weblab.sessions.sessionExists(res.body.session_id)).toBe(true);
    });

    it('forces the configured scheme in the callback URL', async () => {
      const { app } = createTestLab({ settings: { scheme: 'https' } });
      const res = await request(app).post(`${SESSIONS}/`).set('Authorization', basicAuth()).send(startRequestBody());

      expect(res.body.url).toMatch(/^https:\/\/127\.0\.0\.1:\d+\/callback\//);
    });

    it('accepts JSON sent without a JSON content type', async () => {
      const { app } = createTestLab();
      const res = await request(app)
        .post(`${SESSIONS}/`)
        .set('Authorization', basicAuth())
        .set('Content-Type', 'text/plain')
        .send(JSON.stringify(startRequestBody()));

      expect(res.body.session_id).toMatch(/^[A-Za-z0-9_]{43}$/);
    });

    it('answers an error for a malformed request', async () => {
      const { app } = createTestLab();
      const res = await request(app)
        .post(`${SESSIONS}/`)
        .set('Authorization', basicAuth())
        .send({ client_initial_data: {}, server_initial_data: {} });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ error: true, message: 'Missing back' });
    });

    it('answers an error when the lab fails to start', async () => {
      const { app, weblab } = createTestLab();
      weblab.onStart(() => {
        throw new Error('camera offline');
      });
      const res = await request(app).post(`${SESSIONS}/`).set('Authorization', basicAuth()).send(startRequestBody());

      expect(res.body).toEqual({ error: true, message: 'Error initializing laboratory' });
    });

    it('reports the status of one session', async () => {
      const { app, weblab } = createTestLab();
      const created = await weblab.sessions.createSession(startRequestBody(), 'http://lab.test/callback');
      if ('error' in created) throw new Error(created.message);

      const res = await request(app)
        .get(`${SESSIONS}/${created.session_id}/status`)
        .set('Authorization', basicAuth());

      expect(res.body).toEqual({ should_finish: 5 });
    });

    it('reports the status of several sessions', async () => {
      const { app, weblab } = createTestLab();
      const created = await weblab.sessions.createSession(startRequestBody(), 'http://lab.test/callback');
      if ('error' in created) throw new Error(created.message);

      const res = await request(app)
        .post(`${SESSIONS}/status/multiple`)
        .set('Authorization', basicAuth())
        .send({ session_ids: [created.session_id, 'missing'], timeout: 10 });

      expect(res.body).toEqual({ status: { [created.session_id]: 5, missing: -1 } });
    });

    it('requires session_ids for the multiple status', async () => {
      const { app } = createTestLab();
      const res = await request(app).post(`${SESSIONS}/status/multiple`).set('Authorization', basicAuth()).send({});

      expect(res.body).toEqual({
        success: false,
        error_code: 'missing-parameters',
        error_human: 'session_ids expected in POST JSON',
      });
    });

    it('disposes a session on delete, once', async () => {
      const { app, weblab } = createTestLab();
      const onDispose = vi.fn();
      weblab.onDispose(onDispose);
      const created = await weblab.sessions.createSession(startRequestBody(), 'http://lab.test/callback');
      if ('error' in created) throw new Error(created.message);
      const sessionPath = `${SESSIONS}/${created.session_id}`;

      const first = await request(app).post(sessionPath).set('Authorization', basicAuth()).send({ action: 'delete' });
      const second = await request(app).post(sessionPath).set('Authorization', basicAuth()).send({ action: 'delete' });

      expect(first.body).toEqual({ message: 'Deleted' });
      expect(second.body).toEqual({ message: 'Deleted' });
      expect(onDispose).toHaveBeenCalledTimes(1);

      const status = await request(app).get(`${sessionPath}/status`).set('Authorization', basicAuth());
      expect(status.body).toEqual({ should_finish: -1 });
    });

    it('answers "Not found" when deleting an unknown session', async () => {
      const { app } = createTestLab();
      const res = await request(app)
        .post(`${SESSIONS}/missing`)
        .set('Authorization', basicAuth())
        .send({ action: 'delete' });

      expect(res.body).toEqual({ message: 'Not found' });
    });

    it('ignores unknown operations', async () => {
      const { app } = createTestLab();
      const res = await request(app)
        .post(`${SESSIONS}/missing`)
        .set('Authorization', basicAuth())
        .send({ action: 'pause' });

      expect(res.body).toEqual({ message: 'Unknown op' });
    });
  });
});
