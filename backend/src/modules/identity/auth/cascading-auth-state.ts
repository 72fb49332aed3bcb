/**
 * src/modules/identity/auth/cascading-auth-state.ts
 *
 * WHY:
 * - Several consumers in one request (auth hook, pages, user accessor) ask for
 *   the authentication state; the provider must run once per request.
 */

import type { AuthenticationState } from './auth-state';
import type { RevalidatingAuthenticationStateProvider } from './revalidating-auth-state-provider';

export class CascadingAuthenticationState {
  private state: Promise<AuthenticationState> | null = null;

  constructor(private readonly provider: RevalidatingAuthenticationStateProvider) {}

  get(): Promise<AuthenticationState> {
    this.state ??= this.provider.getAuthenticationState();
    return this.state;
  }
}
