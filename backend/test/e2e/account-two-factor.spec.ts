import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { TotpService } from '../../src/shared/security/totp';
import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import { PASSWORD, signedInClient } from '../helpers/identity-flows';
import { TestClient } from '../helpers/test-client';

const EMAIL = 'ada@example.com';
const authenticatorApp = new TotpService('test');

type EnableResponse = { message: string; recoveryCodes: string[] | null };

describe('two-factor authentication', () => {
  let t: TestApp;
  let client: TestClient;
  let userId: string;

  beforeEach(async () => {
    t = await buildTestApp();
    ({ client, userId } = await signedInClient(t, EMAIL));
  });

  afterEach(async () => {
    await t.close();
  });

  async function currentCode(): Promise<string> {
    const user = await t.userStore.findById(userId);
    if (!user) throw new Error('user missing');
    const key = await t.provider.get('userManager').getAuthenticatorKey(user);
    if (!key) throw new Error('no authenticator key');
    return authenticatorApp.generate(key);
  }

  async function enable(): Promise<string[]> {
    const setup = await client.get('/Account/Manage/EnableAuthenticator');
    expect(setup.statusCode).toBe(200);

    const res = await client.postJson('/Account/Manage/EnableAuthenticator', { code: await currentCode() });
    expect(res.statusCode).toBe(200);
    return res.json<EnableResponse>().recoveryCodes ?? [];
  }

  async function passwordStep(login: TestClient): Promise<void> {
    const res = await login.postJson('/Account/Login', { email: EMAIL, password: PASSWORD, returnUrl: '/auth' });
    expect(res.json()).toEqual({ result: 'RequiresTwoFactor', returnUrl: '/auth' });
    expect(login.cookie('identity.2fa')).toBeDefined();
    expect(login.cookie('identity.app')).toBeUndefined();
  }

  it('shows the shared key and otpauth uri for setup', async () => {
    const res = await client.get('/Account/Manage/EnableAuthenticator');
    const body = res.json<{ sharedKey: string; authenticatorUri: string }>();

    expect(body.sharedKey).toMatch(/^([a-z2-7]{4} )+[a-z2-7]{1,4}$/);
    expect(body.authenticatorUri).toMatch(/^otpauth:\/\/totp\//);
    expect(body.authenticatorUri).toContain('ada%40example.com');
  });

  it('enables 2FA with a valid code and returns ten recovery codes once', async () => {
    const codes = await enable();
    expect(codes).toHaveLength(10);
    expect(new Set(codes).size).toBe(10);

    const status = await client.get('/Account/Manage/TwoFactorAuthentication');
    expect(status.json()).toEqual({ hasAuthenticator: true, is2faEnabled: true, recoveryCodesLeft: 10 });

    // The session was refreshed after the stamp changed.
    expect(client.cookie('identity.app')).toBeDefined();
  });

  it('rejects an invalid verification code', async () => {
    await client.get('/Account/Manage/EnableAuthenticator');

    const res = await client.postJson('/Account/Manage/EnableAuthenticator', { code: '12345a' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Verification code is invalid.' } });
  });

  it('requires the authenticator code after the password', async () => {
    await enable();

    const login = new TestClient(t.app);
    await passwordStep(login);

    const page = await login.navigate('/Account/LoginWith2fa?returnUrl=%2Fauth');
    expect(page.body).toContain('<form method="post" action="/Account/LoginWith2fa">');

    const res = await login.postJson('/Account/LoginWith2fa', { twoFactorCode: await currentCode(), returnUrl: '/auth' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ result: 'Succeeded', returnUrl: '/auth' });
    expect(login.cookie('identity.app')).toBeDefined();
    expect(login.cookie('identity.2fa')).toBeUndefined();
  });

  it('redirects browsers from the password step to LoginWith2fa', async () => {
    await enable();

    const login = new TestClient(t.app);
    const res = await login.postForm('/Account/Login', { email: EMAIL, password: PASSWORD, returnUrl: '/auth' });
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe('/Account/LoginWith2fa?returnUrl=%2Fauth&rememberMe=false');
  });

  it('rejects a wrong authenticator code', async () => {
    await enable();

    const login = new TestClient(t.app);
    await passwordStep(login);

    const code = await currentCode();
    const wrong = `${(Number(code[0]) + 1) % 10}${code.slice(1)}`;
    const res = await login.postJson('/Account/LoginWith2fa', { twoFactorCode: wrong });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Invalid authenticator code.' } });
  });

  it('needs the password step before a second factor', async () => {
    const login = new TestClient(t.app);
    const res = await login.postJson('/Account/LoginWith2fa', { twoFactorCode: '123456' });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Unable to load two-factor authentication user.' },
    });
  });

  it('accepts each recovery code once', async () => {
    const [first] = await enable();
    if (!first) throw new Error('no recovery codes');

    const login = new TestClient(t.app);
    await passwordStep(login);
    const res = await login.postJson('/Account/LoginWithRecoveryCode', { recoveryCode: first });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ result: 'Succeeded', returnUrl: '/' });

    const again = new TestClient(t.app);
    await passwordStep(again);
    const reused = await again.postJson('/Account/LoginWithRecoveryCode', { recoveryCode: first });
    expect(reused.statusCode).toBe(401);
    expect(reused.json()).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Invalid recovery code entered.' } });

    const status = await client.get('/Account/Manage/TwoFactorAuthentication');
    expect(status.json<{ recoveryCodesLeft: number }>().recoveryCodesLeft).toBe(9);
  });

  it('generates new recovery codes only while 2FA is enabled', async () => {
    const refused = await client.postJson('/Account/Manage/GenerateRecoveryCodes');
    expect(refused.statusCode).toBe(400);
    expect(refused.json()).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Cannot generate recovery codes for user because they do not have 2FA enabled.',
      },
    });

    const original = await enable();
    const res = await client.postJson('/Account/Manage/GenerateRecoveryCodes');
    expect(res.statusCode).toBe(200);
    const { recoveryCodes } = res.json<{ recoveryCodes: string[] }>();
    expect(recoveryCodes).toHaveLength(10);
    expect(recoveryCodes).not.toContain(original[0]);
  });

  it('disables 2FA so the password alone signs in again', async () => {
    await enable();

    const res = await client.postJson('/Account/Manage/Disable2fa');
    expect(res.statusCode).toBe(200);

    const login = new TestClient(t.app);
    const signIn = await login.postJson('/Account/Login', { email: EMAIL, password: PASSWORD });
    expect(signIn.json()).toEqual({ result: 'Succeeded', returnUrl: '/' });
  });

  it('refuses to disable 2FA that is not enabled', async () => {
    const res = await client.postJson('/Account/Manage/Disable2fa');
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: { code: 'VALIDATION_ERROR', message: "Cannot disable 2FA for user as it's not currently enabled." },
    });
  });

  it('resets the authenticator key and turns 2FA off', async () => {
    await enable();
    const user = await t.userStore.findById(userId);
    const oldKey = user ? await t.provider.get('userManager').getAuthenticatorKey(user) : null;

    const res = await client.postJson('/Account/Manage/ResetAuthenticator');
    expect(res.statusCode).toBe(200);

    const after = await t.userStore.findById(userId);
    expect(after?.twoFactorEnabled).toBe(false);
    const newKey = after ? await t.provider.get('userManager').getAuthenticatorKey(after) : null;
    expect(newKey).not.toBeNull();
    expect(newKey).not.toBe(oldKey);
  });
});
