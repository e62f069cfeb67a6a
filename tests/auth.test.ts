import express from 'express';
import { createServer } from 'http';
import { createAuthMiddleware, getSession } from '../server/auth';
import { MemoryStorage } from './support/memoryStorage';
import { silenceConsole } from './support/fakes';
import { jsonBody, startServer, type TestServer } from './support/http';

describe('Auth middleware', () => {
  let storage: MemoryStorage;
  let server: TestServer;

  beforeEach(async () => {
    silenceConsole();
    storage = new MemoryStorage();
    storage.addUser('farmer-1');
    storage.addUser('admin-1', 'admin');

    const { isAuthenticated, isAdmin } = createAuthMiddleware(storage);
    const app = express();
    app.use(express.json());
    app.use(getSession());

    // Stands in for the sign-in flow
    app.post('/test/login', (req, res) => {
      const userId: unknown = req.body?.userId;
      if (typeof userId === 'string') req.session.userId = userId;
      res.json({ ok: true });
    });
    app.get('/api/me', isAuthenticated, (req, res) => {
      res.json(req.user);
    });
    app.get('/api/admin/ping', isAuthenticated, isAdmin, (_req, res) => {
      res.json({ ok: true });
    });

    server = await startServer(createServer(app));
  });

  afterEach(async () => {
    await server.close();
    jest.restoreAllMocks();
  });

  async function login(userId: string): Promise<string> {
    const response = await server.request('/test/login', jsonBody({ userId }));
    const cookie = response.headers.get('set-cookie');
    if (!cookie) throw new Error('No session cookie issued');
    return cookie.split(';')[0];
  }

  it('rejects requests without a session', async () => {
    const response = await server.request('/api/me');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ message: 'Unauthorized' });
  });

  it('names the session cookie after the service', async () => {
    const cookie = await login('farmer-1');

    expect(cookie.startsWith('cropcare.sid=')).toBe(true);
  });

  it('loads the user from the session', async () => {
    const cookie = await login('farmer-1');

    const response = await server.request('/api/me', { headers: { cookie } });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ id: 'farmer-1', role: 'farmer' });
  });

  it('rejects a session for a user that no longer exists', async () => {
    const cookie = await login('ghost-1');

    const response = await server.request('/api/me', { headers: { cookie } });

    expect(response.status).toBe(401);
  });

  it('reports a failed lookup as a server error', async () => {
    const cookie = await login('farmer-1');
    jest.spyOn(storage, 'getUser').mockRejectedValue(new Error('pool exhausted'));

    const response = await server.request('/api/me', { headers: { cookie } });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ message: 'Failed to authenticate' });
  });

  it('keeps admin routes to admins', async () => {
    const farmerCookie = await login('farmer-1');
    const adminCookie = await login('admin-1');

    const denied = await server.request('/api/admin/ping', { headers: { cookie: farmerCookie } });
    const allowed = await server.request('/api/admin/ping', { headers: { cookie: adminCookie } });

    expect(denied.status).toBe(403);
    expect(denied.body).toEqual({ message: 'Access denied. Admin role required.' });
    expect(allowed.status).toBe(200);
  });
});
