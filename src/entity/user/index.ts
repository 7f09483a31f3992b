import type { Admin } from './Admin';
import type { Advertiser } from './Advertiser';
import type { Brand } from './Brand';
import type { Influencer } from './Influencer';
import { Role } from './User';

export * from './User';
export * from './SocialMediaProfile';
export * from './Influencer';
export * from './Brand';
export * from './Advertiser';
export * from './Admin';

export type AnyUser = Influencer | Brand | Advertiser | Admin;

export type UserByRole = {
  [Role.Influencer]: Influencer;
  [Role.Brand]: Brand;
  [Role.Advertiser]: Advertiser;
  [Role.Admin]: Admin;
};
