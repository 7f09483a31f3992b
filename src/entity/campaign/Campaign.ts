import { isUndefined, omitBy } from 'lodash';
import { v4 as uuidv4 } from 'uuid';
import { formatDocumentDate } from '../../common/date';
import { formatAmount, formatCurrency } from '../../common/number';
import type { Influencer } from '../user/Influencer';
import type { UserRef } from '../user/User';

export enum CampaignStatus {
  Draft = 'Draft',
  Scheduled = 'Scheduled',
  Active = 'Active',
  Paused = 'Paused',
  Completed = 'Completed',
  Cancelled = 'Cancelled',
}

export enum CampaignInfluencerStatus {
  NotInvited = 'Not Invited',
  Invited = 'Invited',
  Accepted = 'Accepted',
  Declined = 'Declined',
  ContentSubmitted = 'Content Submitted',
  Completed = 'Completed',
}

export interface EngagementMetrics {
  likes: number;
  comments: number;
  shares: number;
}

export interface CampaignMetrics {
  total_influencers: number;
  total_posts: number;
  total_engagement: number;
  cost_per_engagement: number;
  total_likes: number;
  total_comments: number;
  total_shares: number;
}

export interface CampaignProps {
  id?: string;
  name: string;
  brand: UserRef;
  description?: string;
  budget?: number;
  startDate?: string | null;
  endDate?: string | null;
  status?: CampaignStatus;
  createdAt?: Date;
}

const emptyMetrics = (): EngagementMetrics => ({
  likes: 0,
  comments: 0,
  shares: 0,
});

const sumEngagement = ({ likes, comments, shares }: EngagementMetrics) =>
  likes + comments + shares;

/**
 * A brand's marketing campaign. Participants are tracked by username only,
 * the influencer entities themselves live in the user repository.
 *
 * Transitions that do not apply to the current status are ignored rather
 * than rejected, callers check `status` when the outcome matters.
 */
export class Campaign {
  readonly id: string;
  readonly brandUsername: string;
  name: string;
  description: string;
  budget: number;
  startDate: string | null;
  endDate: string | null;
  status: CampaignStatus;
  readonly createdAt: Date;
  updatedAt: Date;

  private readonly invited: string[] = [];
  private readonly accepted: string[] = [];
  private readonly influencerStatuses = new Map<
    string,
    CampaignInfluencerStatus
  >();
  private readonly contentUrls = new Map<string, string[]>();
  private readonly engagementMetrics = new Map<string, EngagementMetrics>();

  constructor({
    id,
    name,
    brand,
    description = '',
    budget = 0,
    startDate = null,
    endDate = null,
    status = CampaignStatus.Draft,
    createdAt = new Date(),
  }: CampaignProps) {
    this.id = id ?? uuidv4();
    this.brandUsername = brand.username;
    this.name = name;
    this.description = description;
    this.budget = budget;
    this.startDate = startDate;
    this.endDate = endDate;
    this.status = status;
    this.createdAt = createdAt;
    this.updatedAt = new Date(createdAt.getTime());
  }

  get invitedInfluencers(): readonly string[] {
    return this.invited;
  }

  get acceptedInfluencers(): readonly string[] {
    return this.accepted;
  }

  private touch(): void {
    this.updatedAt = new Date();
  }

  update(
    fields: Partial<
      Pick<Campaign, 'name' | 'description' | 'budget' | 'startDate' | 'endDate'>
    >,
  ): void {
    Object.assign(this, omitBy(fields, isUndefined));
    this.touch();
  }

  isInvited(influencer: UserRef): boolean {
    return this.invited.includes(influencer.username);
  }

  isAccepted(influencer: UserRef): boolean {
    return this.accepted.includes(influencer.username);
  }

  inviteInfluencer(influencer: UserRef): void {
    if (this.isInvited(influencer)) {
      return;
    }

    this.invited.push(influencer.username);
    this.influencerStatuses.set(
      influencer.username,
      CampaignInfluencerStatus.Invited,
    );
    this.touch();
  }

  /** Confirms an invited influencer and links the campaign on their side. */
  acceptInfluencer(influencer: Influencer): void {
    if (!this.isInvited(influencer) || this.isAccepted(influencer)) {
      return;
    }

    this.accepted.push(influencer.username);
    this.influencerStatuses.set(
      influencer.username,
      CampaignInfluencerStatus.Accepted,
    );
    influencer.addCampaign(this.id);
    this.touch();
  }

  // Direct placement, skips the invitation round
  addInfluencer(influencer: Influencer): void {
    if (!this.isInvited(influencer)) {
      this.invited.push(influencer.username);
    }
    if (!this.isAccepted(influencer)) {
      this.accepted.push(influencer.username);
    }

    this.influencerStatuses.set(
      influencer.username,
      CampaignInfluencerStatus.Accepted,
    );
    influencer.addCampaign(this.id);
    this.touch();
  }

  /**
   * Drops every trace of the influencer from the campaign.
   *
   * @returns whether the influencer had been invited
   */
  removeInfluencer(influencer: UserRef): boolean {
    const { username } = influencer;
    const invitedIndex = this.invited.indexOf(username);
    const acceptedIndex = this.accepted.indexOf(username);

    if (invitedIndex !== -1) {
      this.invited.splice(invitedIndex, 1);
    }
    if (acceptedIndex !== -1) {
      this.accepted.splice(acceptedIndex, 1);
    }
    this.influencerStatuses.delete(username);
    this.contentUrls.delete(username);
    this.engagementMetrics.delete(username);

    const removed = invitedIndex !== -1;
    if (removed) {
      this.touch();
    }

    return removed;
  }

  getInfluencerStatus(influencer: UserRef): CampaignInfluencerStatus {
    return (
      this.influencerStatuses.get(influencer.username) ??
      CampaignInfluencerStatus.NotInvited
    );
  }

  updateInfluencerStatus(
    influencer: UserRef,
    status: CampaignInfluencerStatus,
  ): void {
    if (!this.isInvited(influencer)) {
      return;
    }

    this.influencerStatuses.set(influencer.username, status);
    this.touch();
  }

  addContentUrl(influencer: UserRef, url: string): void {
    if (!this.isAccepted(influencer)) {
      return;
    }

    const urls = this.contentUrls.get(influencer.username) ?? [];
    urls.push(url);
    this.contentUrls.set(influencer.username, urls);
    this.touch();
  }

  getContentUrls(influencer: UserRef): string[] {
    return [...(this.contentUrls.get(influencer.username) ?? [])];
  }

  /** Replaces the influencer's metrics, previous values are discarded. */
  updateEngagementMetrics(
    influencer: UserRef,
    likes: number,
    comments: number,
    shares: number,
  ): void {
    if (!this.isAccepted(influencer)) {
      return;
    }

    this.engagementMetrics.set(influencer.username, {
      likes,
      comments,
      shares,
    });
    this.touch();
  }

  hasEngagementMetrics(influencer: UserRef): boolean {
    return this.engagementMetrics.has(influencer.username);
  }

  getEngagementMetrics(influencer: UserRef): EngagementMetrics {
    return {
      ...(this.engagementMetrics.get(influencer.username) ?? emptyMetrics()),
    };
  }

  calculateTotalEngagement(): number {
    let total = 0;
    this.engagementMetrics.forEach((metrics) => {
      total += sumEngagement(metrics);
    });

    return total;
  }

  calculateCostPerEngagement(): number {
    const totalEngagement = this.calculateTotalEngagement();
    if (totalEngagement === 0) {
      return 0;
    }

    return this.budget / totalEngagement;
  }

  getTotalPosts(): number {
    let total = 0;
    this.contentUrls.forEach((urls) => {
      total += urls.length;
    });

    return total;
  }

  private getTotalMetric(metric: keyof EngagementMetrics): number {
    let total = 0;
    this.engagementMetrics.forEach((metrics) => {
      total += metrics[metric];
    });

    return total;
  }

  schedule(): void {
    if (this.status === CampaignStatus.Draft) {
      this.status = CampaignStatus.Scheduled;
      this.touch();
    }
  }

  start(): void {
    if (
      this.status === CampaignStatus.Draft ||
      this.status === CampaignStatus.Scheduled
    ) {
      this.status = CampaignStatus.Active;
      this.touch();
    }
  }

  pause(): void {
    if (this.status === CampaignStatus.Active) {
      this.status = CampaignStatus.Paused;
      this.touch();
    }
  }

  resume(): void {
    if (this.status === CampaignStatus.Paused) {
      this.status = CampaignStatus.Active;
      this.touch();
    }
  }

  // Applies from any status, terminal ones included
  end(): void {
    this.status = CampaignStatus.Completed;
    this.touch();
  }

  cancel(): void {
    this.status = CampaignStatus.Cancelled;
    this.touch();
  }

  isTerminal(): boolean {
    return (
      this.status === CampaignStatus.Completed ||
      this.status === CampaignStatus.Cancelled
    );
  }

  getMetrics(): CampaignMetrics {
    return {
      total_influencers: this.accepted.length,
      total_posts: this.getTotalPosts(),
      total_engagement: this.calculateTotalEngagement(),
      cost_per_engagement: this.calculateCostPerEngagement(),
      total_likes: this.getTotalMetric('likes'),
      total_comments: this.getTotalMetric('comments'),
      total_shares: this.getTotalMetric('shares'),
    };
  }

  formatBudget(decimalPlaces = 2): string {
    return formatAmount(this.budget, decimalPlaces);
  }

  private get duration(): string {
    return `${this.startDate ?? 'TBD'} to ${this.endDate ?? 'TBD'}`;
  }

  generateReport(): string {
    const metrics = this.getMetrics();
    const lines = [
      `Performance Report for Campaign: ${this.name}`,
      `Status: ${this.status}`,
      `Duration: ${this.duration}`,
      `Budget: ${formatCurrency(this.budget)}`,
      '',
      'Overall Metrics:',
      `- Total Influencers: ${metrics.total_influencers}`,
      `- Total Posts: ${metrics.total_posts}`,
      `- Total Engagement: ${metrics.total_engagement}`,
      `- Cost Per Engagement: ${formatCurrency(metrics.cost_per_engagement)}`,
      `- Total Likes: ${metrics.total_likes}`,
      `- Total Comments: ${metrics.total_comments}`,
      `- Total Shares: ${metrics.total_shares}`,
      '',
      'Influencer Performance:',
    ];

    this.accepted.forEach((username) => {
      const engagement =
        this.engagementMetrics.get(username) ?? emptyMetrics();
      const posts = this.contentUrls.get(username)?.length ?? 0;

      lines.push(
        `- ${username}:`,
        `  * Posts: ${posts}`,
        `  * Likes: ${engagement.likes}`,
        `  * Comments: ${engagement.comments}`,
        `  * Shares: ${engagement.shares}`,
        `  * Total Engagement: ${sumEngagement(engagement)}`,
      );
    });

    return `${lines.join('\n')}\n`;
  }

  summary(): string {
    return [
      `Campaign: ${this.name}`,
      `ID: ${this.id}`,
      `Brand: ${this.brandUsername}`,
      `Description: ${this.description}`,
      `Budget: ${formatCurrency(this.budget)}`,
      `Duration: ${this.duration}`,
      `Status: ${this.status}`,
      `Invited Influencers: ${this.invited.length}`,
      `Accepted Influencers: ${this.accepted.length}`,
      `Total Posts: ${this.getTotalPosts()}`,
      `Total Engagement: ${this.calculateTotalEngagement()}`,
      `Created: ${formatDocumentDate(this.createdAt)}`,
      `Last Updated: ${formatDocumentDate(this.updatedAt)}`,
    ].join('\n');
  }
}
