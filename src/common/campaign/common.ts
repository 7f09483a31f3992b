import { isAfter, isBefore, isValid, parseISO } from 'date-fns';
import { orderBy } from 'lodash';
import {
  Campaign,
  CampaignStatus,
  type Brand,
  type UserRef,
} from '../../entity';
import { DataProcessingError } from '../../errors';
import { isCalendarDate } from '../date';
import { identityKeySchema } from '../schema/common';

/**
 * In-memory campaign store keyed by id, in insertion order.
 */
export class CampaignService {
  private readonly campaigns = new Map<string, Campaign>();

  constructor(initialCampaigns: Campaign[] = []) {
    initialCampaigns.forEach((campaign) => this.addCampaign(campaign));
  }

  addCampaign(campaign: Campaign): boolean {
    if (this.campaigns.has(campaign.id)) {
      return false;
    }

    this.campaigns.set(campaign.id, campaign);
    return true;
  }

  getCampaignById(id: string): Campaign | undefined {
    return this.campaigns.get(id);
  }

  deleteCampaign(id: string): boolean {
    return this.campaigns.delete(id);
  }

  /** Stores a new version of a known campaign. Unknown ids are ignored. */
  updateCampaign(campaign: Campaign): boolean {
    if (!this.campaigns.has(campaign.id)) {
      return false;
    }

    this.campaigns.set(campaign.id, campaign);
    return true;
  }

  getAllCampaigns(): Campaign[] {
    return [...this.campaigns.values()];
  }

  getCampaignCount(): number {
    return this.campaigns.size;
  }

  getCampaignsForBrand(brand: UserRef): Campaign[] {
    return this.getAllCampaigns().filter(
      (campaign) => campaign.brandUsername === brand.username,
    );
  }

  /** Campaigns the influencer has accepted. */
  getCampaignsForInfluencer(influencer: UserRef): Campaign[] {
    return this.getAllCampaigns().filter((campaign) =>
      campaign.isAccepted(influencer),
    );
  }

  /** Invitations the influencer has not accepted yet. */
  getCampaignOffersForInfluencer(influencer: UserRef): Campaign[] {
    return this.getAllCampaigns().filter(
      (campaign) =>
        campaign.isInvited(influencer) && !campaign.isAccepted(influencer),
    );
  }

  getCampaignsByStatus(status: CampaignStatus | string): Campaign[] {
    const wanted = status.toLowerCase();
    return this.getAllCampaigns().filter(
      (campaign) => campaign.status.toLowerCase() === wanted,
    );
  }

  getActiveCampaigns(): Campaign[] {
    return this.getCampaignsByStatus(CampaignStatus.Active);
  }

  getCompletedCampaigns(): Campaign[] {
    return this.getCampaignsByStatus(CampaignStatus.Completed);
  }

  /**
   * Campaigns whose whole run falls inside the range, bounds included.
   * A missing or malformed bound matches nothing, and so does a campaign
   * without two valid dates.
   */
  getCampaignsInDateRange(
    start: string | null | undefined,
    end: string | null | undefined,
  ): Campaign[] {
    if (!start || !end || !isCalendarDate(start) || !isCalendarDate(end)) {
      return [];
    }

    const rangeStart = parseISO(start);
    const rangeEnd = parseISO(end);

    return this.getAllCampaigns().filter(({ startDate, endDate }) => {
      if (!startDate || !endDate) {
        return false;
      }

      const campaignStart = parseISO(startDate);
      const campaignEnd = parseISO(endDate);
      if (!isValid(campaignStart) || !isValid(campaignEnd)) {
        return false;
      }

      return (
        !isBefore(campaignStart, rangeStart) && !isAfter(campaignEnd, rangeEnd)
      );
    });
  }

  getCampaignsByName(name: string): Campaign[] {
    if (!name) {
      return [];
    }

    const needle = name.toLowerCase();
    return this.getAllCampaigns().filter((campaign) =>
      campaign.name.toLowerCase().includes(needle),
    );
  }

  getCampaignsByBudgetRange(minBudget: number, maxBudget: number): Campaign[] {
    return this.getAllCampaigns().filter(
      ({ budget }) => budget >= minBudget && budget <= maxBudget,
    );
  }

  getCampaignsWithHighEngagement(threshold: number): Campaign[] {
    return this.getAllCampaigns().filter(
      (campaign) => campaign.calculateTotalEngagement() >= threshold,
    );
  }

  getTopPerformingCampaigns(limit: number): Campaign[] {
    return orderBy(
      this.getAllCampaigns(),
      (campaign) => campaign.calculateTotalEngagement(),
      'desc',
    ).slice(0, limit);
  }

  /** Brand budget left after what its active campaigns have reserved. */
  getRemainingBudget(brand: Brand): number {
    return brand.activeCampaigns.reduce(
      (remaining, id) => remaining - (this.campaigns.get(id)?.budget ?? 0),
      brand.budget,
    );
  }

  setAllCampaigns(campaigns: Campaign[] | null | undefined): void {
    if (!campaigns) {
      throw new DataProcessingError('Campaign list cannot be null');
    }

    const hasEmptyId = campaigns.some(
      ({ id }) => !identityKeySchema.safeParse(id).success,
    );
    if (hasEmptyId) {
      throw new DataProcessingError('Campaign with empty id found');
    }

    this.campaigns.clear();
    campaigns.forEach((campaign) => this.addCampaign(campaign));
  }

  clearAllCampaigns(): void {
    this.campaigns.clear();
  }
}
