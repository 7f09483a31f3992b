import { orderBy } from 'lodash';
import {
  Admin,
  Advertiser,
  Brand,
  Influencer,
  Role,
  type AnyUser,
  type UserByRole,
} from '../entity/user';
import { DataProcessingError } from '../errors';
import { identityKeySchema, parseInput } from './schema/common';
import {
  adminInputSchema,
  advertiserInputSchema,
  brandInputSchema,
  influencerInputSchema,
} from './schema/users';

export interface InfluencerSearch {
  niche?: string | null;
  minFollowers?: number;
  maxRate?: number;
}

const containsIgnoreCase = (
  value: string | null | undefined,
  term: string,
): boolean => !!value && value.toLowerCase().includes(term.toLowerCase());

export const createInfluencer = (input: unknown): Influencer =>
  new Influencer(parseInput(influencerInputSchema, input));

export const createBrand = (input: unknown): Brand =>
  new Brand(parseInput(brandInputSchema, input));

export const createAdvertiser = (input: unknown): Advertiser =>
  new Advertiser(parseInput(advertiserInputSchema, input));

export const createAdmin = (input: unknown): Admin =>
  new Admin(parseInput(adminInputSchema, input));

/**
 * In-memory user directory keyed by username. Registration order is kept so
 * listings are stable.
 */
export class UserService {
  private readonly users = new Map<string, AnyUser>();

  constructor(initialUsers: AnyUser[] = []) {
    initialUsers.forEach((user) => this.addUser(user));
  }

  /** Returns false when the username is already taken. */
  addUser(user: AnyUser): boolean {
    if (this.users.has(user.username)) {
      return false;
    }

    this.users.set(user.username, user);
    return true;
  }

  getUserByUsername(username: string): AnyUser | undefined {
    return this.users.get(username);
  }

  getInfluencer(username: string): Influencer | undefined {
    const user = this.users.get(username);
    return user?.role === Role.Influencer ? user : undefined;
  }

  getBrand(username: string): Brand | undefined {
    const user = this.users.get(username);
    return user?.role === Role.Brand ? user : undefined;
  }

  getAdvertiser(username: string): Advertiser | undefined {
    const user = this.users.get(username);
    return user?.role === Role.Advertiser ? user : undefined;
  }

  findUsersByEmail(email: string): AnyUser[] {
    return this.getAllUsers().filter((user) => user.email === email);
  }

  usernameExists(username: string): boolean {
    return this.users.has(username);
  }

  emailInUse(email: string): boolean {
    return this.findUsersByEmail(email).length > 0;
  }

  deleteUser(username: string): boolean {
    return this.users.delete(username);
  }

  updateUser(
    username: string,
    fields: { email?: string; password?: string },
  ): boolean {
    const user = this.users.get(username);
    if (!user) {
      return false;
    }

    user.updateInfo(fields);
    return true;
  }

  getAllUsers(): AnyUser[] {
    return [...this.users.values()];
  }

  getUserCount(): number {
    return this.users.size;
  }

  getUsersByRole<R extends Role>(role: R): UserByRole[R][] {
    return this.getAllUsers().filter(
      (user): user is UserByRole[R] => user.role === role,
    );
  }

  getAllInfluencers(): Influencer[] {
    return this.getUsersByRole(Role.Influencer);
  }

  getAllBrands(): Brand[] {
    return this.getUsersByRole(Role.Brand);
  }

  getAllAdvertisers(): Advertiser[] {
    return this.getUsersByRole(Role.Advertiser);
  }

  getAllAdmins(): Admin[] {
    return this.getUsersByRole(Role.Admin);
  }

  getInfluencersByNiche(niche: string | null | undefined): Influencer[] {
    if (!niche) {
      return [];
    }

    return this.getAllInfluencers().filter((influencer) =>
      containsIgnoreCase(influencer.niche, niche),
    );
  }

  getBrandsByIndustry(industry: string | null | undefined): Brand[] {
    if (!industry) {
      return [];
    }

    return this.getAllBrands().filter((brand) =>
      containsIgnoreCase(brand.industry, industry),
    );
  }

  searchInfluencers({
    niche,
    minFollowers = 0,
    maxRate = Number.POSITIVE_INFINITY,
  }: InfluencerSearch): Influencer[] {
    return this.getAllInfluencers().filter(
      (influencer) =>
        (!niche || containsIgnoreCase(influencer.niche, niche)) &&
        influencer.getTotalFollowers() >= minFollowers &&
        influencer.rate <= maxRate,
    );
  }

  getTopInfluencers(limit: number): Influencer[] {
    return orderBy(
      this.getAllInfluencers(),
      (influencer) => influencer.getTotalFollowers(),
      'desc',
    ).slice(0, limit);
  }

  getTopBrands(limit: number): Brand[] {
    return orderBy(this.getAllBrands(), 'budget', 'desc').slice(0, limit);
  }

  /** Replaces the whole directory. Nothing changes when the list is invalid. */
  setAllUsers(users: AnyUser[] | null | undefined): void {
    if (!users) {
      throw new DataProcessingError('User list cannot be null');
    }

    const hasEmptyUsername = users.some(
      ({ username }) => !identityKeySchema.safeParse(username).success,
    );
    if (hasEmptyUsername) {
      throw new DataProcessingError('User with empty username found');
    }

    this.users.clear();
    users.forEach((user) => this.addUser(user));
  }
}
