import { addMinutes, addSeconds, isBefore } from 'date-fns';
import { authConfig } from './config';
import type { AnyUser } from './entity';
import { AuthenticationError, AuthenticationFailErrorKeys } from './errors';
import type { UserService } from './common/users';

export interface AuthenticationManagerOptions {
  users: Pick<UserService, 'getUserByUsername'>;
  maxLoginAttempts?: number;
  // seconds
  loginTimeout?: number;
  // minutes
  sessionTimeout?: number;
}

export const PASSWORD_MIN_LENGTH = 8;

export class AuthenticationManager {
  private readonly users: Pick<UserService, 'getUserByUsername'>;
  readonly maxLoginAttempts: number;
  readonly loginTimeout: number;
  readonly sessionTimeout: number;

  constructor({
    users,
    maxLoginAttempts = authConfig.maxLoginAttempts,
    loginTimeout = authConfig.loginTimeout,
    sessionTimeout = authConfig.sessionTimeout,
  }: AuthenticationManagerOptions) {
    this.users = users;
    this.maxLoginAttempts = maxLoginAttempts;
    this.loginTimeout = loginTimeout;
    this.sessionTimeout = sessionTimeout;
  }

  /**
   * Checks the credentials and stamps the login date.
   * @throws AuthenticationError
   */
  authenticate(username: string, password: string): AnyUser {
    if (!username || !password) {
      throw new AuthenticationError(AuthenticationFailErrorKeys.MissingFields);
    }

    const user = this.users.getUserByUsername(username);
    if (!user) {
      throw new AuthenticationError(AuthenticationFailErrorKeys.UserNotFound);
    }

    if (!user.isActive) {
      throw new AuthenticationError(
        AuthenticationFailErrorKeys.AccountInactive,
      );
    }

    if (user.password !== password) {
      throw new AuthenticationError(
        AuthenticationFailErrorKeys.InvalidPassword,
      );
    }

    user.updateLastLoginDate();
    return user;
  }

  validatePasswordStrength(password: string | null | undefined): boolean {
    if (!password || password.length < PASSWORD_MIN_LENGTH) {
      return false;
    }

    return (
      /\p{Lu}/u.test(password) &&
      /\p{Ll}/u.test(password) &&
      /\p{Nd}/u.test(password) &&
      /[^\p{Lu}\p{Ll}\p{Nd}]/u.test(password)
    );
  }

  generatePasswordResetToken(
    user: Pick<AnyUser, 'username'>,
    now: Date = new Date(),
  ): string {
    return `RESET_${user.username}_${now.getTime()}`;
  }

  isSessionValid(sessionStart: Date, now: Date = new Date()): boolean {
    return isBefore(now, addMinutes(sessionStart, this.sessionTimeout));
  }

  isAccountLocked(
    failedAttempts: number,
    lastFailedAt: Date,
    now: Date = new Date(),
  ): boolean {
    if (failedAttempts < this.maxLoginAttempts) {
      return false;
    }

    return isBefore(now, addSeconds(lastFailedAt, this.loginTimeout));
  }
}
