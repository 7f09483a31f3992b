import { formatCalendarDate } from '../../common/date';

export enum Role {
  Influencer = 'Influencer',
  Brand = 'Brand',
  Advertiser = 'Advertiser',
  Admin = 'Admin',
}

export interface UserProps {
  username: string;
  email: string;
  password: string;
  isActive?: boolean;
  createdAt?: Date;
  lastLoginAt?: Date | null;
}

export type UserRef = Pick<User, 'username'>;

/**
 * Base of every account on the platform. The username is the identity key:
 * two instances with the same username are the same user.
 */
export abstract class User {
  abstract readonly role: Role;

  readonly username: string;
  email: string;
  password: string;
  isActive: boolean;
  readonly createdAt: Date;
  lastLoginAt: Date | null;

  constructor({
    username,
    email,
    password,
    isActive = true,
    createdAt = new Date(),
    lastLoginAt = null,
  }: UserProps) {
    this.username = username;
    this.email = email;
    this.password = password;
    this.isActive = isActive;
    this.createdAt = createdAt;
    this.lastLoginAt = lastLoginAt;
  }

  get displayName(): string {
    return this.username;
  }

  equals(other: UserRef | null | undefined): boolean {
    return !!other && other.username === this.username;
  }

  updateLastLoginDate(at: Date = new Date()): void {
    this.lastLoginAt = at;
  }

  updateInfo({ email, password }: { email?: string; password?: string }) {
    if (email) {
      this.email = email;
    }

    if (password) {
      this.password = password;
    }
  }

  protected accountLines(): string[] {
    return [
      `Username: ${this.username}`,
      `Email: ${this.email}`,
      `Role: ${this.role}`,
      `Account Status: ${this.isActive ? 'Active' : 'Inactive'}`,
      `Creation Date: ${formatCalendarDate(this.createdAt)}`,
      `Last Login: ${
        this.lastLoginAt ? formatCalendarDate(this.lastLoginAt) : 'Never'
      }`,
    ];
  }

  abstract profileSummary(): string;
}
