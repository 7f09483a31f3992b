import { meanBy, orderBy, uniq } from 'lodash';
import { recommendationLimit, recommendationMinScore } from '../../config';
import {
  CampaignStatus,
  type Brand,
  type Campaign,
  type Influencer,
} from '../../entity';
import type { UserService } from '../users';
import type { CampaignService } from './common';

export type UserDirectory = Pick<
  UserService,
  'getAllInfluencers' | 'getInfluencersByNiche' | 'getBrand'
>;

export type CampaignDirectory = Pick<
  CampaignService,
  'getAllCampaigns' | 'getCampaignsForBrand'
>;

export interface MatchScore {
  niche: number;
  budget: number;
  followers: number;
  collaboration: number;
  jitter: number;
  total: number;
}

export interface Recommendation<T> {
  item: T;
  score: MatchScore;
}

export const MAX_JITTER = 20;
export const DEFAULT_INFLUENCER_RATE = 500;
const BUDGET_BUFFER = 1.2;

export const relatedNiches: Record<string, string[]> = {
  fashion: ['clothing', 'beauty', 'accessories', 'lifestyle'],
  technology: ['electronics', 'gadgets', 'software', 'gaming'],
  food: ['cooking', 'restaurant', 'beverages', 'nutrition'],
  fitness: ['health', 'sports', 'wellness', 'nutrition'],
  travel: ['tourism', 'hospitality', 'adventure', 'lifestyle'],
};

const campaignTypeMultipliers: Record<string, number> = {
  'product launch': 2.0,
  awareness: 1.5,
  engagement: 1.2,
};

interface PlatformRule {
  keywords: string[];
  add: string[];
  remove?: string[];
}

const industryPlatformRules: PlatformRule[] = [
  {
    keywords: ['fashion', 'beauty', 'lifestyle', 'food'],
    add: ['TikTok', 'Pinterest'],
  },
  {
    keywords: ['tech', 'gaming', 'software', 'business'],
    add: ['Twitter', 'LinkedIn', 'YouTube'],
  },
  {
    keywords: ['entertainment', 'music'],
    add: ['TikTok', 'YouTube', 'Twitch'],
  },
];

const audiencePlatformRules: PlatformRule[] = [
  {
    keywords: ['young', 'teen', 'gen z'],
    add: ['TikTok', 'Snapchat'],
    remove: ['LinkedIn'],
  },
  {
    keywords: ['professional', 'business', 'corporate'],
    add: ['LinkedIn', 'Twitter'],
    remove: ['Snapchat'],
  },
];

const applyPlatformRules = (
  platforms: string[],
  rules: PlatformRule[],
  description: string | null | undefined,
): string[] => {
  if (!description) {
    return platforms;
  }

  const text = description.toLowerCase();
  return rules
    .filter(({ keywords }) => keywords.some((keyword) => text.includes(keyword)))
    .reduce(
      (acc, { add, remove = [] }) =>
        [...acc, ...add].filter((platform) => !remove.includes(platform)),
      platforms,
    );
};

/**
 * Two terms are related when one names a family of the relation table and the
 * other mentions that family or one of its members, or when both mention the
 * same member. Matching is by case-insensitive substring.
 */
export const isRelatedNiche = (first: string, second: string): boolean => {
  const a = first.toLowerCase();
  const b = second.toLowerCase();

  return Object.entries(relatedNiches).some(([family, members]) => {
    const mentionsFamily = (term: string) =>
      term.includes(family) || members.some((member) => term.includes(member));

    return (
      (a.includes(family) && mentionsFamily(b)) ||
      (b.includes(family) && mentionsFamily(a)) ||
      members.some((member) => a.includes(member) && b.includes(member))
    );
  });
};

export const nicheScore = (
  industry: string | null,
  niche: string | null,
): number => {
  if (!industry || !niche) {
    return 0;
  }

  if (industry.toLowerCase() === niche.toLowerCase()) {
    return 100;
  }

  return isRelatedNiche(industry, niche) ? 50 : 0;
};

export const budgetScore = (rate: number, budget: number): number => {
  if (rate <= budget * 0.2) {
    return 50;
  }

  return rate <= budget * 0.4 ? 25 : 0;
};

export const followerScore = (followers: number): number => {
  if (followers > 1_000_000) {
    return 40;
  }

  if (followers > 100_000) {
    return 30;
  }

  return followers > 10_000 ? 20 : 10;
};

const normalizeCampaignType = (campaignType: string): string =>
  campaignType.toLowerCase().replace(/[-_]+/g, ' ').trim();

export interface RecommendationServiceOptions {
  users?: UserDirectory;
  campaigns?: CampaignDirectory;
  random?: () => number;
}

/**
 * Ranks influencers for a campaign and campaigns for an influencer with an
 * additive heuristic score plus a bounded random jitter.
 */
export class RecommendationService {
  private readonly users?: UserDirectory;
  private readonly campaigns?: CampaignDirectory;
  private readonly random: () => number;

  constructor({
    users,
    campaigns,
    random = Math.random,
  }: RecommendationServiceOptions = {}) {
    this.users = users;
    this.campaigns = campaigns;
    this.random = random;
  }

  private drawJitter(): number {
    return Math.floor(this.random() * MAX_JITTER);
  }

  /** True when the influencer was accepted in one of the brand's completed campaigns. */
  hasPreviousCollaboration(brand: Brand, influencer: Influencer): boolean {
    if (!this.campaigns) {
      return false;
    }

    return this.campaigns
      .getCampaignsForBrand(brand)
      .some(
        (campaign) =>
          campaign.status === CampaignStatus.Completed &&
          campaign.isAccepted(influencer),
      );
  }

  scoreInfluencer(
    influencer: Influencer,
    campaign: Campaign,
    brand: Brand,
  ): MatchScore {
    return this.buildScore({
      niche: nicheScore(brand.industry, influencer.niche),
      budget: budgetScore(influencer.rate, campaign.budget),
      followers: followerScore(influencer.getTotalFollowers()),
      collaboration: this.hasPreviousCollaboration(brand, influencer) ? 30 : 0,
    });
  }

  /** Same as the influencer score without the follower tier. */
  scoreCampaign(
    campaign: Campaign,
    influencer: Influencer,
    brand: Brand,
  ): MatchScore {
    return this.buildScore({
      niche: nicheScore(brand.industry, influencer.niche),
      budget: budgetScore(influencer.rate, campaign.budget),
      followers: 0,
      collaboration: this.hasPreviousCollaboration(brand, influencer) ? 30 : 0,
    });
  }

  private buildScore(
    factors: Omit<MatchScore, 'jitter' | 'total'>,
  ): MatchScore {
    const jitter = this.drawJitter();
    const total =
      factors.niche +
      factors.budget +
      factors.followers +
      factors.collaboration +
      jitter;

    return { ...factors, jitter, total };
  }

  private rank<T>(candidates: Recommendation<T>[]): Recommendation<T>[] {
    return orderBy(
      candidates.filter(({ score }) => score.total >= recommendationMinScore),
      ({ score }) => score.total,
      'desc',
    ).slice(0, recommendationLimit);
  }

  rankInfluencers(campaign: Campaign): Recommendation<Influencer>[] {
    const brand = this.users?.getBrand(campaign.brandUsername);
    if (!this.users || !brand) {
      return [];
    }

    return this.rank(
      this.users
        .getAllInfluencers()
        .filter((influencer) => !campaign.isInvited(influencer))
        .map((influencer) => ({
          item: influencer,
          score: this.scoreInfluencer(influencer, campaign, brand),
        })),
    );
  }

  getRecommendedInfluencers(campaign: Campaign): Influencer[] {
    return this.rankInfluencers(campaign).map(({ item }) => item);
  }

  rankCampaigns(influencer: Influencer): Recommendation<Campaign>[] {
    const { users, campaigns } = this;
    if (!users || !campaigns) {
      return [];
    }

    return this.rank(
      campaigns
        .getAllCampaigns()
        .filter(
          (campaign) =>
            !campaign.isInvited(influencer) && !campaign.isTerminal(),
        )
        .flatMap((campaign) => {
          const brand = users.getBrand(campaign.brandUsername);
          if (!brand) {
            return [];
          }

          return [
            {
              item: campaign,
              score: this.scoreCampaign(campaign, influencer, brand),
            },
          ];
        }),
    );
  }

  getRecommendedCampaigns(influencer: Influencer): Campaign[] {
    return this.rankCampaigns(influencer).map(({ item }) => item);
  }

  /**
   * Average rate of influencers in the brand's industry (all influencers when
   * none match) times the number of influencers, weighted by campaign type,
   * plus a 20% buffer.
   */
  recommendCampaignBudget(
    brand: Brand,
    campaignType: string,
    targetInfluencerCount: number,
  ): number {
    if (!this.users) {
      return 0;
    }

    const inIndustry = this.users.getInfluencersByNiche(brand.industry);
    const pool =
      inIndustry.length > 0 ? inIndustry : this.users.getAllInfluencers();
    const averageRate =
      pool.length > 0 ? meanBy(pool, 'rate') : DEFAULT_INFLUENCER_RATE;
    const multiplier =
      campaignTypeMultipliers[normalizeCampaignType(campaignType)] ?? 1.0;

    return averageRate * targetInfluencerCount * multiplier * BUDGET_BUFFER;
  }

  recommendPlatforms(
    brand: Brand,
    audienceDescription?: string | null,
  ): string[] {
    const byIndustry = applyPlatformRules(
      ['Instagram'],
      industryPlatformRules,
      brand.industry,
    );

    return uniq(
      applyPlatformRules(byIndustry, audiencePlatformRules, audienceDescription),
    );
  }
}
