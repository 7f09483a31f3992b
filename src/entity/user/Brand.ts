import { formatCurrency } from '../../common/number';
import { Campaign, type CampaignProps } from '../campaign/Campaign';
import { Role, User, type UserProps } from './User';

export interface BrandProps extends UserProps {
  companyName?: string | null;
  industry?: string | null;
  website?: string | null;
  description?: string | null;
  budget?: number;
}

export type BrandCampaignInput = Omit<CampaignProps, 'brand'>;

export class Brand extends User {
  readonly role = Role.Brand;

  companyName: string | null;
  industry: string | null;
  website: string | null;
  description: string | null;
  budget: number;
  totalCampaigns = 0;
  totalSpent = 0;

  private readonly active: string[] = [];
  private readonly past: string[] = [];

  constructor({
    companyName = null,
    industry = null,
    website = null,
    description = null,
    budget = 0,
    ...props
  }: BrandProps) {
    super(props);

    this.companyName = companyName;
    this.industry = industry;
    this.website = website;
    this.description = description;
    this.budget = budget;
  }

  override get displayName(): string {
    return this.companyName ?? this.username;
  }

  get activeCampaigns(): readonly string[] {
    return this.active;
  }

  get pastCampaigns(): readonly string[] {
    return this.past;
  }

  createCampaign(input: BrandCampaignInput): Campaign {
    const campaign = new Campaign({ ...input, brand: this });
    this.addCampaign(campaign.id);

    return campaign;
  }

  addCampaign(campaignId: string): void {
    if (!this.active.includes(campaignId)) {
      this.active.push(campaignId);
      this.totalCampaigns += 1;
    }
  }

  completeCampaign(campaignId: string, spent: number): boolean {
    const index = this.active.indexOf(campaignId);
    if (index === -1) {
      return false;
    }

    this.active.splice(index, 1);
    this.past.push(campaignId);
    this.totalSpent += spent;

    return true;
  }

  profileSummary(): string {
    return [
      ...this.accountLines(),
      `Company Name: ${this.companyName ?? 'Not specified'}`,
      `Industry: ${this.industry ?? 'Not specified'}`,
      `Website: ${this.website ?? 'Not specified'}`,
      `Description: ${this.description ?? 'Not specified'}`,
      `Total Budget: ${formatCurrency(this.budget)}`,
      `Active Campaigns: ${this.active.length}`,
      `Completed Campaigns: ${this.past.length}`,
      `Total Spent: ${formatCurrency(this.totalSpent)}`,
    ].join('\n');
  }
}
