import type { Campaign } from '../campaign/Campaign';
import type { Brand, BrandCampaignInput } from './Brand';
import { Role, User, type UserProps } from './User';

export const DEFAULT_ADVERTISER_COMMISSION = 10;

export interface AdvertiserProps extends UserProps {
  agencyName?: string | null;
  contactPerson?: string | null;
  phone?: string | null;
  // percent of each managed campaign budget
  commission?: number;
}

export interface CampaignLookup {
  getCampaignById(id: string): Campaign | undefined;
}

/** An agency account acting for one or more brands. */
export class Advertiser extends User {
  readonly role = Role.Advertiser;

  agencyName: string | null;
  contactPerson: string | null;
  phone: string | null;
  commission: number;

  private readonly brands: string[] = [];
  private readonly campaigns: string[] = [];

  constructor({
    agencyName = null,
    contactPerson = null,
    phone = null,
    commission = DEFAULT_ADVERTISER_COMMISSION,
    ...props
  }: AdvertiserProps) {
    super(props);

    this.agencyName = agencyName;
    this.contactPerson = contactPerson;
    this.phone = phone;
    this.commission = commission;
  }

  override get displayName(): string {
    return this.agencyName ?? this.username;
  }

  get managedBrands(): readonly string[] {
    return this.brands;
  }

  get managedCampaigns(): readonly string[] {
    return this.campaigns;
  }

  get totalClients(): number {
    return this.brands.length;
  }

  managesBrand(brand: Pick<Brand, 'username'>): boolean {
    return this.brands.includes(brand.username);
  }

  addBrand(brand: Pick<Brand, 'username'>): boolean {
    if (this.managesBrand(brand)) {
      return false;
    }

    this.brands.push(brand.username);
    return true;
  }

  addBrands(...brands: Pick<Brand, 'username'>[]): number {
    return brands.filter((brand) => this.addBrand(brand)).length;
  }

  removeBrand(brand: Pick<Brand, 'username'>): boolean {
    const index = this.brands.indexOf(brand.username);
    if (index === -1) {
      return false;
    }

    this.brands.splice(index, 1);
    return true;
  }

  addCampaign(campaignId: string): boolean {
    if (this.campaigns.includes(campaignId)) {
      return false;
    }

    this.campaigns.push(campaignId);
    return true;
  }

  addCampaigns(...campaignIds: string[]): number {
    return campaignIds.filter((id) => this.addCampaign(id)).length;
  }

  removeCampaign(campaignId: string): boolean {
    const index = this.campaigns.indexOf(campaignId);
    if (index === -1) {
      return false;
    }

    this.campaigns.splice(index, 1);
    return true;
  }

  createCampaignForBrand(
    brand: Brand,
    input: BrandCampaignInput,
  ): Campaign | undefined {
    if (!this.managesBrand(brand)) {
      return undefined;
    }

    const campaign = brand.createCampaign(input);
    this.addCampaign(campaign.id);

    return campaign;
  }

  calculateRevenue(campaigns: CampaignLookup): number {
    return this.campaigns.reduce((total, id) => {
      const campaign = campaigns.getCampaignById(id);

      return campaign
        ? total + campaign.budget * (this.commission / 100)
        : total;
    }, 0);
  }

  profileSummary(): string {
    return [
      ...this.accountLines(),
      `Agency Name: ${this.agencyName ?? 'Not specified'}`,
      `Contact Person: ${this.contactPerson ?? 'Not specified'}`,
      `Phone: ${this.phone ?? 'Not specified'}`,
      `Managed Brands: ${this.brands.length}`,
      `Managed Campaigns: ${this.campaigns.length}`,
      `Commission Rate: ${this.commission}%`,
    ].join('\n');
  }
}
