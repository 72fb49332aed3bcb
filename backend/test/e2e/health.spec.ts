import { describe, it, expect, vi } from 'vitest';

import { buildTestApp } from '../helpers/build-test-app';
import { signedInClient } from '../helpers/identity-flows';

describe('GET /health', () => {
  it('returns "Healthy" as JSON', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toMatch(/^application\/json/);
      expect(res.body).toBe('"Healthy"');
    } finally {
      await close();
    }
  });

  it('does not require a signed-in user or an antiforgery cookie', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health', headers: { cookie: 'identity.app=unknown' } });
      expect(res.statusCode).toBe(200);
      expect(res.headers['set-cookie']).toBeUndefined();
    } finally {
      await close();
    }
  });

  it('answers for a signed-in client while the user store is unreachable', async () => {
    const t = await buildTestApp();

    try {
      const { client } = await signedInClient(t, 'ada@example.com');
      vi.spyOn(Date, 'now').mockReturnValue(Date.now() + 31 * 60_000);
      const findById = vi
        .spyOn(t.userStore, 'findById')
        .mockRejectedValue(Object.assign(new Error('connect ECONNREFUSED 10.0.0.5:5432'), { code: 'ECONNREFUSED' }));

      const res = await client.get('/health');

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('"Healthy"');
      expect(findById).not.toHaveBeenCalled();
    } finally {
      await t.close();
    }
  });

  it('answers for a signed-in client while the session cache is down', async () => {
    const t = await buildTestApp();

    try {
      const { client } = await signedInClient(t, 'ada@example.com');
      vi.spyOn(t.cache, 'get').mockRejectedValue(new Error('redis down'));

      const res = await client.get('/health');

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('"Healthy"');
    } finally {
      await t.close();
    }
  });
});
