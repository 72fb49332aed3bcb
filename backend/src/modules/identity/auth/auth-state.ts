/**
 * src/modules/identity/auth/auth-state.ts
 *
 * WHY:
 * - Pages, guards and request logs need "who is this request" without each of
 *   them touching cookies or sessions.
 * - The pipeline resolves the state once per request (CascadingAuthenticationState)
 *   and stores it on `req.authState`.
 *
 * RULES:
 * - authState is always set after the authentication hook; anonymous requests
 *   get { isAuthenticated: false }.
 */

export type AuthenticatedUser = {
  id: string;
  userName: string;
};

export type AuthenticationState =
  | { isAuthenticated: false }
  | { isAuthenticated: true; user: AuthenticatedUser; sessionId: string };

export const ANONYMOUS: AuthenticationState = { isAuthenticated: false };

declare module 'fastify' {
  interface FastifyRequest {
    authState: AuthenticationState;
  }

  interface FastifyContextConfig {
    /** false skips session lookup and revalidation; the request stays anonymous. */
    authenticationState?: boolean;
  }
}
