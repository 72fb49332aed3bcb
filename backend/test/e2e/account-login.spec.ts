import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import { PASSWORD, registerConfirmedUser } from '../helpers/identity-flows';
import { TestClient } from '../helpers/test-client';

const EMAIL = 'ada@example.com';

describe('POST /Account/Login', () => {
  let t: TestApp;
  let client: TestClient;

  beforeEach(async () => {
    t = await buildTestApp();
    client = new TestClient(t.app);
  });

  afterEach(async () => {
    await t.close();
  });

  it('refuses unconfirmed accounts with the generic message', async () => {
    await client.postJson('/Account/Register', { email: EMAIL, password: PASSWORD, confirmPassword: PASSWORD });

    const res = await client.postJson('/Account/Login', { email: EMAIL, password: PASSWORD });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Invalid login attempt.' } });
    expect(client.cookie('identity.app')).toBeUndefined();
  });

  it('signs confirmed users in with the application cookie', async () => {
    await registerConfirmedUser(t, client, EMAIL);

    const res = await client.postJson('/Account/Login', { email: EMAIL, password: PASSWORD, returnUrl: '/auth' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ result: 'Succeeded', returnUrl: '/auth' });
    expect(client.cookie('identity.app')).toBeDefined();

    const page = await client.navigate('/auth');
    expect(page.statusCode).toBe(200);
    expect(page.body).toContain('You are authenticated');
    expect(page.body).toContain(`Hello ${EMAIL}!`);
  });

  it('never redirects outside the site', async () => {
    await registerConfirmedUser(t, client, EMAIL);

    const res = await client.postForm('/Account/Login', {
      email: EMAIL,
      password: PASSWORD,
      returnUrl: '//evil.example/steal',
    });
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe('/');
  });

  it('answers unknown users and wrong passwords the same way', async () => {
    await registerConfirmedUser(t, client, EMAIL);

    const unknown = await client.postJson('/Account/Login', { email: 'nobody@example.com', password: PASSWORD });
    const wrong = await client.postJson('/Account/Login', { email: EMAIL, password: 'Wr0ng-pass' });

    expect(unknown.statusCode).toBe(401);
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toEqual(unknown.json());
  });

  it('locks the account after five failed attempts', async () => {
    await registerConfirmedUser(t, client, EMAIL);

    for (let i = 0; i < 4; i++) {
      const res = await client.postJson('/Account/Login', { email: EMAIL, password: 'Wr0ng-pass' });
      expect(res.statusCode).toBe(401);
    }

    const fifth = await client.postJson('/Account/Login', { email: EMAIL, password: 'Wr0ng-pass' });
    expect(fifth.statusCode).toBe(403);
    expect(fifth.json()).toEqual({
      error: { code: 'LOCKED_OUT', message: 'This account has been locked out, please try again later.' },
    });

    const correct = await client.postJson('/Account/Login', { email: EMAIL, password: PASSWORD });
    expect(correct.statusCode).toBe(403);
  });

  it('sends locked-out browsers to the lockout page', async () => {
    await registerConfirmedUser(t, client, EMAIL);
    for (let i = 0; i < 5; i++) {
      await client.postJson('/Account/Login', { email: EMAIL, password: 'Wr0ng-pass' });
    }

    const res = await client.postForm('/Account/Login', { email: EMAIL, password: PASSWORD });
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe('/Account/Lockout');
  });

  it('sends failed form logins back to the login page with an error', async () => {
    await registerConfirmedUser(t, client, EMAIL);

    const res = await client.postForm('/Account/Login', { email: EMAIL, password: 'Wr0ng-pass', returnUrl: '/auth' });
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe('/Account/Login?ReturnUrl=%2Fauth');

    const page = await client.navigate('/Account/Login?ReturnUrl=%2Fauth');
    expect(page.body).toContain('<div class="status status-error" role="alert">Error: Invalid login attempt.</div>');
  });
});

describe('POST /Account/Logout', () => {
  it('ends the session', async () => {
    const t = await buildTestApp();
    const client = new TestClient(t.app);

    try {
      await registerConfirmedUser(t, client, EMAIL);
      await client.postJson('/Account/Login', { email: EMAIL, password: PASSWORD });
      const sessionCookie = client.cookie('identity.app');
      expect(sessionCookie).toBeDefined();

      const res = await client.postJson('/Account/Logout');
      expect(res.statusCode).toBe(204);
      expect(client.cookie('identity.app')).toBeUndefined();

      // The old cookie no longer names a session.
      const replay = await t.app.inject({
        method: 'GET',
        url: '/Account/Manage',
        headers: { cookie: `identity.app=${sessionCookie ?? ''}` },
      });
      expect(replay.statusCode).toBe(401);
    } finally {
      await t.close();
    }
  });

  it('redirects form posts to the return url', async () => {
    const t = await buildTestApp();
    const client = new TestClient(t.app);

    try {
      const res = await client.postForm('/Account/Logout', { returnUrl: '/Account/Login' });
      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe('/Account/Login');
    } finally {
      await t.close();
    }
  });
});

describe('GET /auth', () => {
  it('sends anonymous browsers to the login page', async () => {
    const t = await buildTestApp();
    const client = new TestClient(t.app);

    try {
      const page = await client.navigate('/auth');
      expect(page.statusCode).toBe(302);
      expect(page.headers.location).toBe('/Account/Login?ReturnUrl=%2Fauth');

      const json = await client.get('/auth');
      expect(json.statusCode).toBe(401);
      expect(json.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Unauthorized' } });
    } finally {
      await t.close();
    }
  });
});
