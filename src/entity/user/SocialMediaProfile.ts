export type ProfileMetricValue = number | string;

export class SocialMediaProfile {
  readonly platform: string;
  handle: string;
  followers: number;
  // whole percent
  engagementRate: number;
  private readonly metrics = new Map<string, ProfileMetricValue>();

  constructor({
    platform,
    handle,
    followers,
  }: {
    platform: string;
    handle: string;
    followers: number;
  }) {
    this.platform = platform;
    this.handle = handle;
    this.followers = followers;
    this.engagementRate = 0;
  }

  addMetric(name: string, value: ProfileMetricValue): void {
    this.metrics.set(name, value);
  }

  getMetric(name: string): ProfileMetricValue | undefined {
    return this.metrics.get(name);
  }

  toString(): string {
    return `${this.platform}: @${this.handle} (${this.followers} followers, ${this.engagementRate}% engagement)`;
  }
}
