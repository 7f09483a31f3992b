import { formatCurrency } from '../../common/number';
import { SocialMediaProfile } from './SocialMediaProfile';
import { Role, User, type UserProps } from './User';

export interface InfluencerProps extends UserProps {
  niche?: string | null;
  bio?: string | null;
  rate?: number;
}

const platformKey = (platform: string): string => platform.toLowerCase();

export class Influencer extends User {
  readonly role = Role.Influencer;

  niche: string | null;
  bio: string | null;
  // per post
  rate: number;
  totalCampaigns = 0;
  totalEarnings = 0;

  private readonly socialMediaProfiles = new Map<string, SocialMediaProfile>();
  private readonly active: string[] = [];
  private readonly past: string[] = [];
  private readonly categories: string[] = [];

  constructor({ niche = null, bio = null, rate = 0, ...props }: InfluencerProps) {
    super(props);

    this.niche = niche;
    this.bio = bio;
    this.rate = rate;
  }

  /** Ids of campaigns the influencer currently takes part in. */
  get activeCampaigns(): readonly string[] {
    return this.active;
  }

  get pastCampaigns(): readonly string[] {
    return this.past;
  }

  get contentCategories(): readonly string[] {
    return this.categories;
  }

  addContentCategory(category: string): void {
    if (!this.categories.includes(category)) {
      this.categories.push(category);
    }
  }

  addSocialMedia(
    platform: string,
    handle: string,
    followers: number,
  ): SocialMediaProfile {
    const profile = new SocialMediaProfile({ platform, handle, followers });
    this.socialMediaProfiles.set(platformKey(platform), profile);

    return profile;
  }

  updateSocialMedia(
    platform: string,
    handle: string,
    followers: number,
  ): boolean {
    const profile = this.socialMediaProfiles.get(platformKey(platform));
    if (!profile) {
      return false;
    }

    profile.handle = handle;
    profile.followers = followers;

    return true;
  }

  removeSocialMedia(platform: string): boolean {
    return this.socialMediaProfiles.delete(platformKey(platform));
  }

  getSocialMedia(platform: string): SocialMediaProfile | undefined {
    return this.socialMediaProfiles.get(platformKey(platform));
  }

  getSocialMediaProfiles(): SocialMediaProfile[] {
    return [...this.socialMediaProfiles.values()];
  }

  getHandle(platform: string): string | undefined {
    return this.getSocialMedia(platform)?.handle;
  }

  getFollowerCount(platform: string): number {
    return this.getSocialMedia(platform)?.followers ?? 0;
  }

  getTotalFollowers(): number {
    let total = 0;
    this.socialMediaProfiles.forEach((profile) => {
      total += profile.followers;
    });

    return total;
  }

  /**
   * Records post metrics on a platform and recomputes its engagement rate.
   * Comments weigh twice a like and shares three times.
   */
  calculateEngagement(
    platform: string,
    likes: number,
    comments: number,
    shares: number,
  ): void {
    const profile = this.getSocialMedia(platform);
    if (!profile) {
      return;
    }

    profile.addMetric('likes', likes);
    profile.addMetric('comments', comments);
    profile.addMetric('shares', shares);

    if (profile.followers <= 0) {
      profile.engagementRate = 0;
      return;
    }

    const engagement = likes + comments * 2 + shares * 3;
    profile.engagementRate = Math.trunc((engagement / profile.followers) * 100);
  }

  addCampaign(campaignId: string): void {
    if (!this.active.includes(campaignId)) {
      this.active.push(campaignId);
      this.totalCampaigns += 1;
    }
  }

  /** Moves an active campaign to the past list and books the earnings. */
  completeCampaign(campaignId: string, earnings: number): boolean {
    const index = this.active.indexOf(campaignId);
    if (index === -1) {
      return false;
    }

    this.active.splice(index, 1);
    this.past.push(campaignId);
    this.totalEarnings += earnings;

    return true;
  }

  profileSummary(): string {
    const lines = [
      ...this.accountLines(),
      `Niche: ${this.niche ?? 'Not specified'}`,
      `Bio: ${this.bio ?? 'Not specified'}`,
      `Rate: ${formatCurrency(this.rate)} per post`,
      `Total Followers: ${this.getTotalFollowers()}`,
      `Active Campaigns: ${this.active.length}`,
      `Completed Campaigns: ${this.past.length}`,
      `Total Earnings: ${formatCurrency(this.totalEarnings)}`,
      '',
      'Social Media Profiles:',
      ...this.getSocialMediaProfiles().map((profile) => profile.toString()),
      '',
      `Content Categories: ${this.categories.join(', ')}`,
    ];

    return lines.join('\n');
  }
}
