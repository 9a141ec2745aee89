import fetch from 'node-fetch';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { boundaryFailure, silentLogger } from './helpers/fakes.js';
import { createTestServices } from './helpers/services.js';
import type { TestServices } from './helpers/services.js';

describe('WebServer', () => {
  let env: TestServices;
  let server: WebServer;
  let baseUrl: string;

  async function call(method: string, path: string, body?: unknown) {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  async function newSession(): Promise<string> {
    const { body } = await call('POST', '/api/sessions');
    return body.data.sessionId;
  }

  beforeEach(async () => {
    env = createTestServices();
    server = new WebServer(env.services, 0, silentLogger);
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.stop();
    env.close();
  });

  describe('conversations', () => {
    it('answers a question and records the exchange', async () => {
      env.client.reply('别担心');
      const sessionId = await newSession();

      const asked = await call('POST', `/api/sessions/${sessionId}/conversations/emotional/messages`, {
        text: '我很焦虑',
      });
      expect(asked.status).toBe(200);
      expect(asked.body.data.reply).toBe('别担心');
      expect(asked.body.data.history).toHaveLength(2);

      const listed = await call('GET', `/api/sessions/${sessionId}/conversations/emotional`);
      expect(listed.body.data).toEqual([
        { role: 'user', content: '我很焦虑' },
        { role: 'assistant', content: '别担心' },
      ]);

      const other = await call('GET', `/api/sessions/${sessionId}/conversations/cultural`);
      expect(other.body.data).toEqual([]);
    });

    it('deletes one message and returns the rest', async () => {
      env.client.reply('answer');
      const sessionId = await newSession();
      await call('POST', `/api/sessions/${sessionId}/conversations/cultural/messages`, { text: 'question' });

      const deleted = await call('DELETE', `/api/sessions/${sessionId}/conversations/cultural/messages/0`);
      expect(deleted.status).toBe(200);
      expect(deleted.body.data).toEqual([{ role: 'assistant', content: 'answer' }]);

      const outOfRange = await call('DELETE', `/api/sessions/${sessionId}/conversations/cultural/messages/5`);
      expect(outOfRange.status).toBe(404);
      expect(outOfRange.body).toEqual({
        success: false,
        code: 'INDEX_OUT_OF_RANGE',
        error: 'Index 5 is out of range for a history of 1 messages',
      });
    });

    it('clears a conversation', async () => {
      const sessionId = await newSession();
      await call('POST', `/api/sessions/${sessionId}/conversations/emotional/messages`, { text: 'hi' });

      const cleared = await call('DELETE', `/api/sessions/${sessionId}/conversations/emotional`);
      expect(cleared.status).toBe(200);
      expect((await call('GET', `/api/sessions/${sessionId}/conversations/emotional`)).body.data).toEqual([]);
    });

    it('shows a boundary failure as chat text and keeps history', async () => {
      env.client.reply(boundaryFailure('HTTP error! status: 503'));
      const sessionId = await newSession();

      const failed = await call('POST', `/api/sessions/${sessionId}/conversations/emotional/messages`, {
        text: 'hello',
      });
      expect(failed.status).toBe(502);
      expect(failed.body.code).toBe('BOUNDARY_ERROR');
      expect(failed.body.data).toEqual({ displayText: '发生错误：HTTP error! status: 503', history: [] });
    });

    it('rejects unknown sessions, topics and empty text', async () => {
      const sessionId = await newSession();

      expect((await call('GET', '/api/sessions/nope/conversations/emotional')).status).toBe(404);
      expect((await call('GET', `/api/sessions/${sessionId}/conversations/weather`)).status).toBe(400);

      const empty = await call('POST', `/api/sessions/${sessionId}/conversations/emotional/messages`, { text: '' });
      expect(empty.status).toBe(400);
      expect(env.client.requests).toHaveLength(0);
    });

    it('ends sessions', async () => {
      const sessionId = await newSession();
      expect((await call('DELETE', `/api/sessions/${sessionId}`)).status).toBe(200);
      expect((await call('DELETE', `/api/sessions/${sessionId}`)).status).toBe(404);
    });
  });

  describe('profile', () => {
    it('saves a valid profile and rejects an invalid one', async () => {
      const sessionId = await newSession();

      const saved = await call('PUT', `/api/sessions/${sessionId}/profile`, {
        situationType: '其他',
        otherSituation: '租房合同',
        emotionalState: '有点焦虑',
      });
      expect(saved.status).toBe(200);
      expect(saved.body.data).toEqual({ situation: '其他：租房合同', currentStatus: '', emotionalState: '有点焦虑' });

      const invalid = await call('PUT', `/api/sessions/${sessionId}/profile`, { situationType: '其他' });
      expect(invalid.status).toBe(400);
      expect(invalid.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('posts', () => {
    it('publishes and lists posts', async () => {
      const created = await call('POST', '/api/posts', {
        content: '想家了',
        category: '文化适应',
        mood: '很难过 😢',
        postDate: '2026-03-05',
      });
      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({ moodColor: '#CD5C5C', moodScore: 0, postDate: '2026-03-05' });

      const listed = await call('GET', '/api/posts');
      expect(listed.body.data).toHaveLength(1);
      expect(listed.body.data[0].content).toBe('想家了');
    });

    it('maps validation failures to 400', async () => {
      const unknownMood = await call('POST', '/api/posts', { content: 'x', category: '其他', mood: '超级开心' });
      expect(unknownMood.status).toBe(400);
      expect(unknownMood.body.code).toBe('UNKNOWN_MOOD');

      const missingCategory = await call('POST', '/api/posts', { content: 'x' });
      expect(missingCategory.status).toBe(400);
      expect(missingCategory.body.code).toBe('VALIDATION_ERROR');
    });

    it('answers 500 when storage is unavailable', async () => {
      env.connection.close();

      const failed = await call('POST', '/api/posts', { content: 'x', category: '其他' });
      expect(failed.status).toBe(500);
      expect(failed.body.success).toBe(false);
      expect(failed.body.code).toBe('STORAGE_ERROR');
      expect(failed.body.error).toMatch(/^Failed to save post: /);
    });

    it('generates a supportive reply for a post', async () => {
      const created = await call('POST', '/api/posts', { content: 'I feel lonely', category: '人际关系' });
      env.client.reply('You are not alone.');

      const support = await call('POST', `/api/posts/${created.body.data.id}/support`);
      expect(support.status).toBe(200);
      expect(support.body.data.reply).toBe('You are not alone.');

      expect((await call('POST', '/api/posts/999/support')).status).toBe(404);
    });
  });

  describe('analytics', () => {
    it('serves the calendar of a month', async () => {
      await call('POST', '/api/posts', { content: 'good day', category: '其他', mood: '非常开心', postDate: '2026-03-02' });

      const calendar = await call('GET', '/api/analytics/calendar?month=2026-03');
      expect(calendar.status).toBe(200);
      expect(calendar.body.data.cells[1]).toMatchObject({ date: '2026-03-02', color: '#FFD700' });

      expect((await call('GET', '/api/analytics/calendar?month=March')).status).toBe(400);
    });

    it('serves trend and summary', async () => {
      await call('POST', '/api/posts', { content: 'a', category: '其他', mood: '心情不错', postDate: '2026-03-02' });

      const trend = await call('GET', '/api/analytics/trend?metric=moodScore');
      expect(trend.body.data.points.map((p: { value: number }) => p.value)).toEqual([75]);
      expect((await call('GET', '/api/analytics/trend?metric=loudness')).status).toBe(400);

      const summary = await call('GET', '/api/analytics/summary');
      expect(summary.body.data.totalPosts).toBe(1);
    });
  });

  describe('vocabularies and health', () => {
    it('lists moods, categories and situations', async () => {
      expect((await call('GET', '/api/moods')).body.data).toHaveLength(5);
      expect((await call('GET', '/api/categories')).body.data).toEqual(['学业压力', '文化适应', '人际关系', '其他']);
      expect((await call('GET', '/api/situations')).body.data.emotionalStates).toHaveLength(5);
    });

    it('reports health', async () => {
      const health = await call('GET', '/api/health');
      expect(health.status).toBe(200);
      expect(health.body.data.status).toBe('healthy');

      env.client.healthy = false;
      expect((await call('GET', '/api/health')).body.data.status).toBe('degraded');
    });

    it('answers malformed JSON with 400', async () => {
      const res = await fetch(`${baseUrl}/api/posts`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"content": ',
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, code: 'VALIDATION_ERROR', error: 'Malformed JSON body' });
    });
  });
});
