import {
  Brand,
  Influencer,
  type BrandProps,
  type InfluencerProps,
} from '../src/entity';

type AccountFields = 'username' | 'email' | 'password';

export const makeInfluencer = (
  username: string,
  {
    followers,
    ...props
  }: Omit<InfluencerProps, AccountFields> & { followers?: number } = {},
): Influencer => {
  const influencer = new Influencer({
    username,
    email: `${username}@example.com`,
    password: 'test-password',
    ...props,
  });

  if (followers !== undefined) {
    influencer.addSocialMedia('Instagram', username, followers);
  }

  return influencer;
};

export const makeBrand = (
  username: string,
  props: Omit<BrandProps, AccountFields> = {},
): Brand =>
  new Brand({
    username,
    email: `${username}@example.com`,
    password: 'test-password',
    ...props,
  });

export const fixedRandom =
  (value: number): (() => number) =>
  () =>
    value;

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }

  return undefined;
};
