import type { TestApp } from './build-test-app';
import { TestClient } from './test-client';

export const PASSWORD = 'Passw0rd!';

/** Path and query of an absolute link taken from an email. */
export function localPath(link: string): string {
  const url = new URL(link);
  return `${url.pathname}${url.search}`;
}

/**
 * Registers through POST /Account/Register and follows the emailed confirmation link.
 * Returns the new user's id.
 */
export async function registerConfirmedUser(
  t: TestApp,
  client: TestClient,
  email: string,
  password = PASSWORD,
): Promise<string> {
  const res = await client.postJson('/Account/Register', { email, password, confirmPassword: password });
  if (res.statusCode !== 201) throw new Error(`register failed: ${res.statusCode} ${res.body}`);
  const { userId } = res.json<{ userId: string }>();

  const mail = t.emailSender.last('identity.confirmation-link');
  if (!mail) throw new Error('no confirmation email captured');

  const confirmed = await client.get(localPath(mail.link));
  if (confirmed.statusCode !== 200) throw new Error(`confirm failed: ${confirmed.statusCode} ${confirmed.body}`);

  return userId;
}

/** A confirmed user signed in with a fresh client. */
export async function signedInClient(t: TestApp, email: string, password = PASSWORD) {
  const client = new TestClient(t.app);
  const userId = await registerConfirmedUser(t, client, email, password);

  const login = await client.postJson('/Account/Login', { email, password });
  if (login.statusCode !== 200) throw new Error(`login failed: ${login.statusCode} ${login.body}`);

  return { client, userId };
}
