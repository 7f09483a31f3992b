import { countBy, meanBy, orderBy, sumBy } from 'lodash';
import { platformCommissionRate } from '../config';
import {
  Role,
  type Advertiser,
  type AnyUser,
  type Brand,
  type Campaign,
  type CampaignStatus,
  type Influencer,
} from '../entity';
import { formatDocumentDate } from './date';
import { formatAmount, formatCurrency } from './number';
import type { CampaignService } from './campaign/common';
import type { UserService } from './users';

const TOP_LIMIT = 5;

interface AnalyticsSources {
  users: Pick<UserService, 'getAllBrands' | 'getAllInfluencers'>;
  campaigns: Pick<CampaignService, 'getAllCampaigns'>;
}

export interface PlatformFinancials {
  totalBrandBudgets: number;
  totalBrandSpent: number;
  totalCampaignBudgets: number;
  totalInfluencerEarnings: number;
  estimatedPlatformRevenue: number;
  topSpendingBrands: Brand[];
  topEarningInfluencers: Influencer[];
  mostExpensiveCampaigns: Campaign[];
}

export interface CampaignPerformanceOverview {
  totalCampaigns: number;
  statusCounts: Partial<Record<CampaignStatus, number>>;
  totalBudget: number;
  totalEngagement: number;
  totalPosts: number;
  // 0 when nothing was engaged with yet
  overallCostPerEngagement: number;
  topCampaigns: Campaign[];
}

export const getPlatformFinancials = ({
  users,
  campaigns,
}: AnalyticsSources): PlatformFinancials => {
  const brands = users.getAllBrands();
  const influencers = users.getAllInfluencers();
  const allCampaigns = campaigns.getAllCampaigns();
  const totalBrandSpent = sumBy(brands, 'totalSpent');

  return {
    totalBrandBudgets: sumBy(brands, 'budget'),
    totalBrandSpent,
    totalCampaignBudgets: sumBy(allCampaigns, 'budget'),
    totalInfluencerEarnings: sumBy(influencers, 'totalEarnings'),
    estimatedPlatformRevenue: totalBrandSpent * platformCommissionRate,
    topSpendingBrands: orderBy(brands, 'totalSpent', 'desc').slice(
      0,
      TOP_LIMIT,
    ),
    topEarningInfluencers: orderBy(influencers, 'totalEarnings', 'desc').slice(
      0,
      TOP_LIMIT,
    ),
    mostExpensiveCampaigns: orderBy(allCampaigns, 'budget', 'desc').slice(
      0,
      TOP_LIMIT,
    ),
  };
};

export const generateFinancialReport = ({
  generatedAt = new Date(),
  ...sources
}: AnalyticsSources & { generatedAt?: Date }): string => {
  const financials = getPlatformFinancials(sources);
  const commissionLabel = `${Math.round(platformCommissionRate * 100)}%`;

  const lines = [
    '===== FINANCIAL REPORT =====',
    `Generated on: ${formatDocumentDate(generatedAt)}`,
    '',
    'PLATFORM FINANCIALS:',
    `Total Brand Budgets: ${formatCurrency(financials.totalBrandBudgets)}`,
    `Total Brand Spent: ${formatCurrency(financials.totalBrandSpent)}`,
    `Total Campaign Budgets: ${formatCurrency(financials.totalCampaignBudgets)}`,
    `Total Influencer Earnings: ${formatCurrency(
      financials.totalInfluencerEarnings,
    )}`,
    `Estimated Platform Revenue (${commissionLabel} commission): ${formatCurrency(
      financials.estimatedPlatformRevenue,
    )}`,
    '',
    'TOP SPENDING BRANDS:',
    ...financials.topSpendingBrands.map(
      (brand) =>
        `- ${brand.displayName}: ${formatCurrency(brand.totalSpent)}`,
    ),
    '',
    'TOP EARNING INFLUENCERS:',
    ...financials.topEarningInfluencers.map(
      (influencer) =>
        `- ${influencer.username}: ${formatCurrency(influencer.totalEarnings)}`,
    ),
    '',
    'MOST EXPENSIVE CAMPAIGNS:',
    ...financials.mostExpensiveCampaigns.map(
      (campaign) => `- ${campaign.name}: ${formatCurrency(campaign.budget)}`,
    ),
  ];

  return `${lines.join('\n')}\n`;
};

/** Rough valuation: a fifth of brand budgets plus a cent per follower. */
export const calculatePlatformValue = ({
  users,
}: Pick<AnalyticsSources, 'users'>): number =>
  sumBy(users.getAllBrands(), 'budget') * 0.2 +
  sumBy(users.getAllInfluencers(), (influencer) =>
    influencer.getTotalFollowers(),
  ) *
    0.01;

export const getCampaignPerformanceOverview = ({
  campaigns,
}: Pick<AnalyticsSources, 'campaigns'>): CampaignPerformanceOverview => {
  const allCampaigns = campaigns.getAllCampaigns();
  const totalBudget = sumBy(allCampaigns, 'budget');
  const totalEngagement = sumBy(allCampaigns, (campaign) =>
    campaign.calculateTotalEngagement(),
  );

  return {
    totalCampaigns: allCampaigns.length,
    statusCounts: countBy(allCampaigns, 'status'),
    totalBudget,
    totalEngagement,
    totalPosts: sumBy(allCampaigns, (campaign) => campaign.getTotalPosts()),
    overallCostPerEngagement:
      totalEngagement > 0 ? totalBudget / totalEngagement : 0,
    topCampaigns: orderBy(
      allCampaigns,
      (campaign) => campaign.calculateTotalEngagement(),
      'desc',
    ).slice(0, TOP_LIMIT),
  };
};

export const generateBrandRecommendations = (
  brand: Pick<Brand, 'industry'>,
): string[] => [
  'Consider increasing budget for higher engagement',
  `Target influencers in ${brand.industry ?? 'your industry'}`,
  'Focus on platforms with highest ROI for your industry',
];

type UserReportDirectory = Pick<
  UserService,
  | 'getAllUsers'
  | 'getAllInfluencers'
  | 'getAllBrands'
  | 'getAllAdvertisers'
  | 'getAllAdmins'
  | 'getTopInfluencers'
  | 'getTopBrands'
>;

type CampaignReportDirectory = Pick<
  CampaignService,
  'getCampaignById' | 'getCampaignsForBrand' | 'getRemainingBudget'
>;

export interface InfluencerGrowth {
  totalFollowers: number;
  // mean of the profiles' whole-percent rates
  averageEngagementRate: number;
  averageEarningsPerCampaign: number;
  earningsTrend: 'Growing' | 'Flat';
}

const percentOf = (count: number, total: number): string =>
  `${formatAmount(total > 0 ? (count * 100) / total : 0, 1)}%`;

const orEmpty = (lines: string[], placeholder: string): string[] =>
  lines.length > 0 ? lines : [placeholder];

const toReport = (lines: string[]): string => `${lines.join('\n')}\n`;

const resolveCampaigns = (
  ids: readonly string[],
  campaigns: Pick<CampaignService, 'getCampaignById'>,
): Campaign[] =>
  ids.flatMap((id) => {
    const campaign = campaigns.getCampaignById(id);
    return campaign ? [campaign] : [];
  });

const campaignHistory = (
  ids: readonly string[],
  campaigns: Pick<CampaignService, 'getCampaignById'>,
): string[] =>
  orEmpty(
    resolveCampaigns(ids, campaigns).map(({ name }) => `- ${name}`),
    'No past campaigns',
  );

export const generateUserActivityReport = ({
  users,
  generatedAt = new Date(),
}: {
  users: UserReportDirectory;
  generatedAt?: Date;
}): string => {
  const allUsers = users.getAllUsers();
  const total = allUsers.length;
  const active = allUsers.filter(({ isActive }) => isActive).length;
  const distribution: [string, number][] = [
    ['Influencers', users.getAllInfluencers().length],
    ['Brands', users.getAllBrands().length],
    ['Advertisers', users.getAllAdvertisers().length],
    ['Admins', users.getAllAdmins().length],
  ];

  return toReport([
    '===== USER ACTIVITY REPORT =====',
    `Generated on: ${formatDocumentDate(generatedAt)}`,
    '',
    'OVERALL STATISTICS:',
    `Total Users: ${total}`,
    `Active Users: ${active} (${percentOf(active, total)})`,
    '',
    'USER DISTRIBUTION:',
    ...distribution.map(
      ([label, count]) => `${label}: ${count} (${percentOf(count, total)})`,
    ),
    '',
    'TOP INFLUENCERS (by follower count):',
    ...users
      .getTopInfluencers(TOP_LIMIT)
      .map(
        (influencer) =>
          `- ${influencer.username}: ${influencer.getTotalFollowers()} followers`,
      ),
    '',
    'TOP BRANDS (by budget):',
    ...users
      .getTopBrands(TOP_LIMIT)
      .map((brand) => `- ${brand.displayName}: ${formatCurrency(brand.budget)}`),
  ]);
};

export const generateInfluencerAnalytics = ({
  influencer,
  campaigns,
}: {
  influencer: Influencer;
  campaigns: Pick<CampaignService, 'getCampaignById'>;
}): string => {
  const activeCampaigns = resolveCampaigns(
    influencer.activeCampaigns,
    campaigns,
  ).flatMap((campaign) => {
    const line = `- ${campaign.name} (Status: ${campaign.getInfluencerStatus(
      influencer,
    )})`;
    if (!campaign.hasEngagementMetrics(influencer)) {
      return [line];
    }

    const { likes, comments, shares } =
      campaign.getEngagementMetrics(influencer);
    return [
      line,
      `  * Likes: ${likes}`,
      `  * Comments: ${comments}`,
      `  * Shares: ${shares}`,
      `  * Total Engagement: ${likes + comments + shares}`,
    ];
  });

  return toReport([
    `===== Influencer Analytics: ${influencer.username} =====`,
    `Total Followers: ${influencer.getTotalFollowers()}`,
    `Total Campaigns: ${influencer.totalCampaigns}`,
    `Total Earnings: ${formatCurrency(influencer.totalEarnings)}`,
    '',
    'Social Media Profiles:',
    ...orEmpty(
      influencer.getSocialMediaProfiles().map((profile) => profile.toString()),
      'No social media profiles',
    ),
    '',
    'Active Campaigns:',
    ...orEmpty(activeCampaigns, 'No active campaigns'),
    '',
    'Campaign History:',
    ...campaignHistory(influencer.pastCampaigns, campaigns),
  ]);
};

const costPerEngagementLabel = (value: number): string =>
  value > 0 ? formatCurrency(value, 4) : 'N/A';

const returnOnInvestment = (
  brand: Brand,
  campaigns: Pick<CampaignService, 'getCampaignsForBrand'>,
): string[] => {
  const owned = campaigns.getCampaignsForBrand(brand);
  if (owned.length === 0) {
    return ['No campaigns to analyze'];
  }

  const investment = sumBy(owned, 'budget');
  const engagement = sumBy(owned, (campaign) =>
    campaign.calculateTotalEngagement(),
  );
  if (engagement === 0) {
    return ['No engagement data available'];
  }

  return [
    `Total Investment: ${formatCurrency(investment)}`,
    `Total Engagement: ${engagement}`,
    `Average Cost Per Engagement: ${formatCurrency(investment / engagement, 4)}`,
  ];
};

export const generateBrandAnalytics = ({
  brand,
  campaigns,
}: {
  brand: Brand;
  campaigns: CampaignReportDirectory;
}): string =>
  toReport([
    `===== Brand Analytics: ${brand.displayName} =====`,
    `Total Budget: ${formatCurrency(brand.budget)}`,
    `Remaining Budget: ${formatCurrency(campaigns.getRemainingBudget(brand))}`,
    `Total Spent: ${formatCurrency(brand.totalSpent)}`,
    `Total Campaigns: ${brand.totalCampaigns}`,
    '',
    'Active Campaigns:',
    ...orEmpty(
      resolveCampaigns(brand.activeCampaigns, campaigns).flatMap((campaign) => [
        `- ${campaign.name} (Status: ${campaign.status})`,
        `  * Budget: ${formatCurrency(campaign.budget)}`,
        `  * Influencers: ${campaign.acceptedInfluencers.length}`,
        `  * Total Engagement: ${campaign.calculateTotalEngagement()}`,
        `  * Cost Per Engagement: ${costPerEngagementLabel(
          campaign.calculateCostPerEngagement(),
        )}`,
      ]),
      'No active campaigns',
    ),
    '',
    'Campaign History:',
    ...campaignHistory(brand.pastCampaigns, campaigns),
    '',
    'ROI Analysis:',
    ...returnOnInvestment(brand, campaigns),
  ]);

export const generateAdvertiserAnalytics = ({
  advertiser,
  users,
  campaigns,
}: {
  advertiser: Advertiser;
  users: Pick<UserService, 'getBrand'>;
  campaigns: Pick<CampaignService, 'getCampaignById'>;
}): string => {
  const commissionOf = (campaign: Campaign): number =>
    campaign.budget * (advertiser.commission / 100);

  return toReport([
    `===== Advertiser Analytics: ${advertiser.displayName} =====`,
    `Total Clients: ${advertiser.totalClients}`,
    `Managed Brands: ${advertiser.managedBrands.length}`,
    `Managed Campaigns: ${advertiser.managedCampaigns.length}`,
    `Commission Rate: ${advertiser.commission}%`,
    `Estimated Revenue: ${formatCurrency(advertiser.calculateRevenue(campaigns))}`,
    '',
    'Managed Brands:',
    ...orEmpty(
      advertiser.managedBrands.flatMap((username) => {
        const brand = users.getBrand(username);
        if (!brand) {
          return [`- ${username}`];
        }

        return [
          `- ${brand.displayName}`,
          `  * Budget: ${formatCurrency(brand.budget)}`,
          `  * Active Campaigns: ${brand.activeCampaigns.length}`,
        ];
      }),
      'No managed brands',
    ),
    '',
    'Managed Campaigns:',
    ...orEmpty(
      resolveCampaigns(advertiser.managedCampaigns, campaigns).flatMap(
        (campaign) => [
          `- ${campaign.name} (Status: ${campaign.status})`,
          `  * Budget: ${formatCurrency(campaign.budget)}`,
          `  * Brand: ${
            users.getBrand(campaign.brandUsername)?.displayName ??
            campaign.brandUsername
          }`,
          `  * Influencers: ${campaign.acceptedInfluencers.length}`,
          `  * Revenue (Commission): ${formatCurrency(commissionOf(campaign))}`,
        ],
      ),
      'No managed campaigns',
    ),
  ]);
};

/** Picks the analytics view matching the account's role. */
export const generateUserAnalytics = ({
  user,
  users,
  campaigns,
}: {
  user: AnyUser;
  users: Pick<UserService, 'getBrand'>;
  campaigns: CampaignReportDirectory;
}): string => {
  switch (user.role) {
    case Role.Influencer:
      return generateInfluencerAnalytics({ influencer: user, campaigns });
    case Role.Brand:
      return generateBrandAnalytics({ brand: user, campaigns });
    case Role.Advertiser:
      return generateAdvertiserAnalytics({ advertiser: user, users, campaigns });
    case Role.Admin:
      return toReport([user.profileSummary()]);
  }
};

// Derived from the current snapshot, no follower history is kept
export const analyzeInfluencerGrowth = (
  influencer: Influencer,
): InfluencerGrowth => {
  const profiles = influencer.getSocialMediaProfiles();
  const completed = influencer.pastCampaigns.length;

  return {
    totalFollowers: influencer.getTotalFollowers(),
    averageEngagementRate:
      profiles.length > 0 ? meanBy(profiles, 'engagementRate') : 0,
    averageEarningsPerCampaign:
      completed > 0 ? influencer.totalEarnings / completed : 0,
    earningsTrend: influencer.totalEarnings > 0 ? 'Growing' : 'Flat',
  };
};
