/**
 * src/modules/identity/auth/user-accessor.ts
 *
 * WHY:
 * - Manage endpoints need the full user record of the signed-in request, not
 *   just the session's id and name.
 *
 * RULES:
 * - Anonymous request -> 401. Session for a user that no longer exists -> 404.
 */

import { AppError } from '../../../shared/http/errors';
import { IdentityErrors } from '../identity.errors';
import type { IdentityUser } from '../identity.types';
import type { UserManager } from '../user-manager';
import type { CascadingAuthenticationState } from './cascading-auth-state';

export class UserAccessor {
  constructor(
    private readonly authState: CascadingAuthenticationState,
    private readonly userManager: UserManager,
  ) {}

  async getRequiredUser(): Promise<IdentityUser> {
    const state = await this.authState.get();
    if (!state.isAuthenticated) {
      throw AppError.unauthorized();
    }

    const user = await this.userManager.findById(state.user.id);
    if (!user) {
      throw IdentityErrors.userNotLoaded(state.user.id);
    }
    return user;
  }
}
