import {
  ERRORS,
  LIMITS,
  validateEmail,
  validatePassword,
  type CreateUserRequest,
  type IssuedToken,
  type ServiceResult,
  type User,
  type UserProfile,
  type UserRole,
  type UserStatus,
  type UserSummary,
} from '@rollcall/shared';
import { DuplicateKeyError, type DocumentCollection } from '../store/index.js';
import { generateToken, hashPassword, verifyPassword } from '../utils/crypto.js';
import { addHours, addMinutes, hasElapsed } from '../utils/time.js';
import { fail, ok, withStorage, type Failure } from './results.js';
import { rejectingVerifier, type SecondFactorVerifier } from './two-factor.js';

export interface AccountManagerOptions {
  secondFactor?: SecondFactorVerifier;
  // The built-in administrator; deleteUser refuses it.
  protectedUsername?: string;
}

export interface ResetIssued extends IssuedToken {
  username: string;
}

function toProfile(user: User): UserProfile {
  return { username: user.username, role: user.role, name: user.name, email: user.email };
}

function toSummary(user: User): UserSummary {
  return {
    username: user.username,
    name: user.name,
    email: user.email,
    role: user.role,
    status: user.status,
    failedAttempts: user.failedAttempts,
    isLocked: user.isLocked,
    createdAt: user.createdAt,
    lastLogin: user.lastLogin,
  };
}

function lockedFailure(lockoutUntil: string): Failure {
  return fail('ACCOUNT_LOCKED', `${ERRORS.ACCOUNT_LOCKED} until ${lockoutUntil}`);
}

// Null when the password satisfies the policy.
function policyFailure(password: string): Failure | null {
  const result = validatePassword(password);
  return result.valid ? null : fail(result.reason);
}

export class AccountManager {
  private readonly secondFactor: SecondFactorVerifier;
  private readonly protectedUsername: string;

  constructor(
    private readonly users: DocumentCollection<User>,
    options: AccountManagerOptions = {},
  ) {
    this.secondFactor = options.secondFactor ?? rejectingVerifier;
    this.protectedUsername = options.protectedUsername ?? 'admin';
  }

  createUser(request: CreateUserRequest): Promise<ServiceResult<UserProfile>> {
    return withStorage('createUser', async () => {
      const { username, password, email, name, role } = request;
      if (username.length < LIMITS.USERNAME_MIN_LENGTH || username.length > LIMITS.USERNAME_MAX_LENGTH) {
        return fail('INVALID_USERNAME');
      }
      if (!validateEmail(email)) return fail('INVALID_EMAIL');
      if (await this.users.findOne({ username })) return fail('USERNAME_TAKEN');
      if (await this.users.findOne({ email })) return fail('EMAIL_TAKEN');
      const rejected = policyFailure(password);
      if (rejected) return rejected;

      const user: User = {
        username,
        passwordHash: await hashPassword(password),
        email,
        name,
        role,
        status: 'active',
        failedAttempts: 0,
        isLocked: false,
        lockoutUntil: null,
        lastLogin: null,
        passwordResetToken: null,
        passwordResetExpires: null,
        twoFactorEnabled: false,
        createdAt: new Date().toISOString(),
        lastModified: null,
      };

      try {
        await this.users.insertOne(user);
      } catch (err) {
        // Lost a race with a concurrent signup for the same name or address.
        if (err instanceof DuplicateKeyError) {
          return fail(err.fields.includes('email') ? 'EMAIL_TAKEN' : 'USERNAME_TAKEN');
        }
        throw err;
      }
      return ok(toProfile(user), 'Account created successfully');
    });
  }

  /**
   * Checks credentials and drives the lockout counter. Without a password
   * this only confirms the account still exists, is unlocked and is active;
   * that path is for revalidating a session the server issued itself.
   */
  authenticateUser(username: string, password?: string): Promise<ServiceResult<UserProfile>> {
    return withStorage('authenticateUser', async () => {
      let user = await this.users.findOne({ username });
      if (!user) return fail('USER_NOT_FOUND');

      const now = new Date();
      if (user.isLocked) {
        if (user.lockoutUntil && !hasElapsed(user.lockoutUntil, now)) {
          return lockedFailure(user.lockoutUntil);
        }
        user =
          (await this.users.updateOne(
            { username },
            { $set: { isLocked: false, lockoutUntil: null, failedAttempts: 0 } },
          )) ?? user;
      }

      if (user.status !== 'active') return fail('ACCOUNT_INACTIVE');
      if (password === undefined) return ok(toProfile(user), 'Session valid');

      if (await verifyPassword(password, user.passwordHash)) {
        await this.users.updateOne(
          { username },
          { $set: { failedAttempts: 0, isLocked: false, lockoutUntil: null, lastLogin: now.toISOString() } },
        );
        return ok(toProfile(user), 'Login successful');
      }

      const counted = await this.users.updateOne({ username }, { $inc: { failedAttempts: 1 } });
      const attempts = counted?.failedAttempts ?? user.failedAttempts + 1;
      if (attempts >= LIMITS.MAX_LOGIN_ATTEMPTS) {
        const lockoutUntil = addMinutes(now, LIMITS.LOCKOUT_MINUTES).toISOString();
        await this.users.updateOne({ username }, { $set: { isLocked: true, lockoutUntil } });
        console.warn(`Account ${username} locked until ${lockoutUntil} after ${attempts} failed attempts`);
        return lockedFailure(lockoutUntil);
      }
      return fail('INVALID_PASSWORD');
    });
  }

  // Only consulted after a successful password check.
  verifyTwoFactor(username: string, code?: string): Promise<ServiceResult<null>> {
    return withStorage('verifyTwoFactor', async () => {
      const user = await this.users.findOne({ username });
      if (!user) return fail('USER_NOT_FOUND');
      if (!user.twoFactorEnabled) return ok(null, 'Second factor not required');
      if (!code) return fail('TWO_FACTOR_REQUIRED');
      if (!(await this.secondFactor.verify(user, code))) return fail('INVALID_TWO_FACTOR');
      return ok(null, 'Second factor verified');
    });
  }

  async changePassword(username: string, currentPassword: string, newPassword: string): Promise<ServiceResult<null>> {
    const auth = await this.authenticateUser(username, currentPassword);
    if (!auth.ok) {
      return auth.error.code === 'INVALID_PASSWORD' ? fail('CURRENT_PASSWORD_INCORRECT') : auth;
    }
    const rejected = policyFailure(newPassword);
    if (rejected) return rejected;

    return withStorage('changePassword', async () => {
      const passwordHash = await hashPassword(newPassword);
      const updated = await this.users.updateOne(
        { username },
        { $set: { passwordHash, lastModified: new Date().toISOString() } },
      );
      if (!updated) return fail('USER_NOT_FOUND');
      return ok(null, 'Password changed successfully');
    });
  }

  generateResetToken(username: string): Promise<ServiceResult<IssuedToken>> {
    return withStorage('generateResetToken', async () => {
      const token = generateToken();
      const expiresAt = addHours(new Date(), LIMITS.RESET_TOKEN_TTL_HOURS).toISOString();
      const updated = await this.users.updateOne(
        { username },
        { $set: { passwordResetToken: token, passwordResetExpires: expiresAt } },
      );
      if (!updated) return fail('USER_NOT_FOUND');
      return ok({ id: token, expiresAt }, 'Reset token generated');
    });
  }

  requestPasswordReset(email: string): Promise<ServiceResult<ResetIssued>> {
    return withStorage('requestPasswordReset', async () => {
      if (!validateEmail(email)) return fail('INVALID_EMAIL');
      const user = await this.users.findOne({ email });
      if (!user) return fail('USER_NOT_FOUND');
      const issued = await this.generateResetToken(user.username);
      if (!issued.ok) return issued;
      return ok({ username: user.username, ...issued.data }, issued.message);
    });
  }

  resetPassword(token: string, newPassword: string): Promise<ServiceResult<null>> {
    return withStorage('resetPassword', async () => {
      const rejected = policyFailure(newPassword);
      if (rejected) return rejected;
      if (!token) return fail('INVALID_OR_EXPIRED_TOKEN');

      const now = new Date().toISOString();
      const user = await this.users.findOne({ passwordResetToken: token, passwordResetExpires: { $gt: now } });
      if (!user) return fail('INVALID_OR_EXPIRED_TOKEN');

      const passwordHash = await hashPassword(newPassword);
      // Conditioned on the token so a second concurrent reset finds nothing.
      const updated = await this.users.updateOne(
        { username: user.username, passwordResetToken: token },
        { $set: { passwordHash, passwordResetToken: null, passwordResetExpires: null, lastModified: now } },
      );
      if (!updated) return fail('INVALID_OR_EXPIRED_TOKEN');
      return ok(null, 'Password reset successfully');
    });
  }

  // Creates the administrator on first start; a no-op once any account exists.
  bootstrapAdmin(request: Omit<CreateUserRequest, 'role'>): Promise<ServiceResult<{ created: boolean }>> {
    return withStorage<{ created: boolean }>('bootstrapAdmin', async () => {
      if ((await this.users.countDocuments()) > 0) {
        return ok({ created: false }, 'Users already exist, skipping admin bootstrap');
      }
      const created = await this.createUser({ ...request, role: 'admin' });
      if (!created.ok) return created;
      return ok({ created: true }, `Admin account ${request.username} created`);
    });
  }

  listUsers(): Promise<ServiceResult<UserSummary[]>> {
    return withStorage('listUsers', async () => {
      const users = await this.users.find();
      return ok(
        users.map(toSummary).sort((a, b) => a.username.localeCompare(b.username)),
        `${users.length} users`,
      );
    });
  }

  unlockUser(username: string): Promise<ServiceResult<UserSummary>> {
    return this.patch('unlockUser', username, { isLocked: false, lockoutUntil: null, failedAttempts: 0 }, 'Account unlocked');
  }

  setRole(username: string, role: UserRole): Promise<ServiceResult<UserSummary>> {
    return this.patch('setRole', username, { role }, `Role set to ${role}`);
  }

  setStatus(username: string, status: UserStatus): Promise<ServiceResult<UserSummary>> {
    return this.patch('setStatus', username, { status }, `Status set to ${status}`);
  }

  deleteUser(username: string): Promise<ServiceResult<null>> {
    return withStorage('deleteUser', async () => {
      if (username === this.protectedUsername) return fail('PROTECTED_ACCOUNT');
      const deleted = await this.users.deleteMany({ username });
      if (deleted === 0) return fail('USER_NOT_FOUND');
      return ok(null, `User ${username} deleted`);
    });
  }

  private patch(
    operation: string,
    username: string,
    changes: Partial<User>,
    message: string,
  ): Promise<ServiceResult<UserSummary>> {
    return withStorage(operation, async () => {
      const updated = await this.users.updateOne(
        { username },
        { $set: { ...changes, lastModified: new Date().toISOString() } },
      );
      if (!updated) return fail('USER_NOT_FOUND');
      return ok(toSummary(updated), message);
    });
  }
}
