import '../config';

import {
  acceptInvitation,
  completeCampaign,
  createCampaign,
  inviteInfluencer,
  settlePayments,
} from '../common/campaign';
import { generateFinancialReport } from '../common/analytics';
import { createAdmin, createBrand, createInfluencer } from '../common/users';
import { Context } from '../Context';
import type { Brand, Influencer } from '../entity';

interface DemoData {
  brand: Brand;
  influencers: Influencer[];
}

export const seedDemoData = (ctx: Context): DemoData => {
  const admin = createAdmin({
    username: 'admin',
    email: 'admin@example.com',
    password: 'test-password',
  });
  const brand = createBrand({
    username: 'northwind',
    email: 'team@northwind.example.com',
    password: 'test-password',
    companyName: 'Northwind Outfitters',
    industry: 'Fashion',
    budget: 20000,
  });
  const influencers = [
    createInfluencer({
      username: 'ava.styles',
      email: 'ava@example.com',
      password: 'test-password',
      niche: 'Fashion',
      rate: 800,
    }),
    createInfluencer({
      username: 'milo.glow',
      email: 'milo@example.com',
      password: 'test-password',
      niche: 'Beauty',
      rate: 450,
    }),
    createInfluencer({
      username: 'kai.codes',
      email: 'kai@example.com',
      password: 'test-password',
      niche: 'Technology',
      rate: 1200,
    }),
  ];

  influencers[0].addSocialMedia('Instagram', 'ava.styles', 240000);
  influencers[0].addSocialMedia('TikTok', 'avastyles', 85000);
  influencers[1].addSocialMedia('Instagram', 'milo.glow', 42000);
  influencers[2].addSocialMedia('YouTube', 'kaicodes', 1300000);

  [admin, brand, ...influencers].forEach((user) => ctx.users.addUser(user));

  return { brand, influencers };
};

export default async function demo(): Promise<void> {
  const ctx = new Context();
  const { brand } = seedDemoData(ctx);
  ctx.notifications.start();

  const campaign = createCampaign({
    ctx,
    brand,
    input: {
      name: 'Autumn Layers',
      description: 'Seasonal outerwear launch',
      budget: 5000,
      startDate: '2026-10-01',
      endDate: '2026-11-15',
    },
  });

  const recommended = ctx.recommendations.getRecommendedInfluencers(campaign);
  console.log('Recommended influencers:');
  recommended.forEach((influencer) => console.log(`- ${influencer.username}`));
  console.log(
    `Suggested platforms: ${ctx.recommendations
      .recommendPlatforms(brand, 'young professionals')
      .join(', ')}`,
  );

  campaign.start();
  recommended.slice(0, 2).forEach((influencer) => {
    inviteInfluencer({ ctx, campaign, influencer });
    acceptInvitation({ ctx, campaign, influencer });
    campaign.addContentUrl(
      influencer,
      `https://social.example.com/${influencer.username}/1`,
    );
    campaign.updateEngagementMetrics(influencer, 1200, 85, 40);

    ctx.contracts
      .createContract({ campaign, influencer, brand })
      ?.signContract();
  });

  const [firstContract] = ctx.contracts.getContractsForCampaign(campaign);
  if (firstContract) {
    console.log(firstContract.generateContractDocument());
  }

  const { payments } = completeCampaign({ ctx, campaign });
  settlePayments({ ctx, payments, paymentMethod: 'Bank Transfer' });

  console.log(campaign.generateReport());
  payments.forEach((payment) => console.log(payment.generateReceipt()));
  console.log(
    generateFinancialReport({ users: ctx.users, campaigns: ctx.campaigns }),
  );

  await ctx.notifications.flush();
  await ctx.notifications.stop();
}
