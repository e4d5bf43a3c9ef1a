import request from 'supertest';
import express from 'express';
import { createApp } from '../../src/server';
import { createContainer, Container } from '../../src/container';
import { Config } from '../../src/infrastructure/config/Config';

describe('Tool API', () => {
  let container: Container;
  let app: express.Application;

  beforeEach(() => {
    const config = Config.fromObject({ log: { level: 'error', format: 'json' } });
    container = createContainer(config);
    app = createApp(container);
  });

  afterEach(async () => {
    await container.shutdown();
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
    });
  });

  describe('GET /ws-status', () => {
    it('should say when no bridge is attached', async () => {
      const res = await request(app).get('/ws-status');
      expect(res.body).toEqual({ error: 'WebSocket server not initialized yet' });
    });
  });

  describe('GET /api/tools', () => {
    it('should list the tool catalog', async () => {
      const res = await request(app).get('/api/tools');

      expect(res.status).toBe(200);
      expect(res.body.tools).toHaveLength(12);
      expect(res.body.tools.map((t: { name: string }) => t.name)).toContain('generate_bank_emails');
    });
  });

  describe('POST /api/tools/:name', () => {
    it('should report an empty mailbox before initialization', async () => {
      const res = await request(app).post('/api/tools/get_inbox_status').send({});

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ success: true, status: 'empty', total_emails: 0 });
    });

    it('should serve the starter inbox after initialize', async () => {
      await container.initialize();

      const res = await request(app).post('/api/tools/list_emails').send({ limit: 3 });

      expect(res.status).toBe(200);
      expect(res.body.count).toBe(3);
      expect(res.body.emails[0].id).toBe('northbridge-001-overdraft');
    });

    it('should accept a request without a body', async () => {
      const res = await request(app).post('/api/tools/get_folder_summary');

      expect(res.status).toBe(200);
      expect(res.body.total_folders).toBe(6);
    });

    it('should return tagged failures with status 200', async () => {
      const res = await request(app).post('/api/tools/read_email').send({ email_id: 'missing' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: false,
        error: 'Email with ID missing not found.',
        email_id: 'missing',
        email: null,
      });
    });

    it('should reject invalid arguments with 400', async () => {
      const res = await request(app)
        .post('/api/tools/send_email')
        .send({ to: ['friend@example.com'], subject: 'Hi', body: 'x', priority: 'critical' });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid arguments for send_email' });
      expect(res.body.details[0].path).toBe('priority');
    });

    it('should reject a non-object body', async () => {
      const res = await request(app).post('/api/tools/list_emails').send([1, 2]);

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Invalid request body');
    });

    it('should reject a malformed tool name', async () => {
      const res = await request(app).post('/api/tools/Drop-Tables').send({});

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Invalid URL parameters');
    });

    it('should return 404 for an unknown tool', async () => {
      const res = await request(app).post('/api/tools/drop_tables').send({});

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ code: 'NOT_FOUND', message: "Tool with id 'drop_tables' not found" });
    });
  });

  describe('GET /api/folders', () => {
    it('should summarize folders', async () => {
      await container.initialize();

      const res = await request(app).get('/api/folders');

      expect(res.body.folders[0]).toEqual({ name: 'inbox', display_name: 'Inbox', email_count: 8, unread_count: 8 });
    });
  });
});
