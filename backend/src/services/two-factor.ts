import type { User } from '@rollcall/shared';

/**
 * Second-factor check run after a correct password, for accounts with
 * `twoFactorEnabled`. Accounts without it never reach the verifier.
 */
export interface SecondFactorVerifier {
  verify(user: User, code: string): Promise<boolean>;
}

// No second factor ships yet, so an account that turns it on cannot pass.
export const rejectingVerifier: SecondFactorVerifier = {
  async verify() {
    return false;
  },
};
