export enum AuthenticationFailErrorKeys {
  MissingFields = 'MISSING_FIELDS',
  UserNotFound = 'USER_NOT_FOUND',
  AccountInactive = 'ACCOUNT_INACTIVE',
  InvalidPassword = 'INVALID_PASSWORD',
}

export const AuthenticationFailErrorMessage: Record<
  AuthenticationFailErrorKeys,
  string
> = {
  [AuthenticationFailErrorKeys.MissingFields]:
    'Username and password cannot be empty',
  [AuthenticationFailErrorKeys.UserNotFound]: 'User not found',
  [AuthenticationFailErrorKeys.AccountInactive]: 'Account is inactive',
  [AuthenticationFailErrorKeys.InvalidPassword]: 'Invalid password',
};

export class AuthenticationError extends Error {
  code: AuthenticationFailErrorKeys;

  constructor(code: AuthenticationFailErrorKeys) {
    super(AuthenticationFailErrorMessage[code]);

    this.code = code;

    Object.defineProperty(this, 'name', { value: 'AuthenticationError' });
  }
}

// Raised when a stored collection cannot be loaded as-is
export class DataProcessingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);

    Object.defineProperty(this, 'name', { value: 'DataProcessingError' });
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);

    Object.defineProperty(this, 'name', { value: 'ValidationError' });
  }
}
