import { CampaignService } from '../../../src/common/campaign';
import { Campaign, CampaignStatus } from '../../../src/entity';
import { DataProcessingError } from '../../../src/errors';
import { captureError, makeBrand, makeInfluencer } from '../../helpers';

const seed = () => {
  const northwind = makeBrand('northwind', { budget: 10000 });
  const acme = makeBrand('acme', { budget: 5000 });
  const spring = northwind.createCampaign({
    name: 'Spring Drop',
    description: 'Outerwear launch',
    budget: 3000,
    startDate: '2026-03-01',
    endDate: '2026-03-31',
  });
  const summer = northwind.createCampaign({
    name: 'Summer Drop',
    budget: 2000,
    startDate: '2026-06-01',
    endDate: '2026-08-15',
  });
  const launch = acme.createCampaign({ name: 'Launch Week', budget: 4500 });

  return {
    campaigns: new CampaignService([spring, summer, launch]),
    northwind,
    acme,
    spring,
    summer,
    launch,
  };
};

describe('CampaignService', () => {
  it('should store each campaign id once', () => {
    const { campaigns, spring } = seed();

    expect(campaigns.addCampaign(spring)).toBe(false);
    expect(campaigns.getCampaignCount()).toBe(3);
    expect(campaigns.getCampaignById(spring.id)).toBe(spring);
  });

  it('should only update known campaigns', () => {
    const { campaigns, northwind } = seed();
    const stray = new Campaign({ name: 'Stray', brand: northwind });

    expect(campaigns.updateCampaign(stray)).toBe(false);
    expect(campaigns.getCampaignById(stray.id)).toBeUndefined();
  });

  it('should filter by brand', () => {
    const { campaigns, acme, launch } = seed();

    expect(campaigns.getCampaignsForBrand(acme)).toEqual([launch]);
  });

  it('should separate accepted campaigns from open offers', () => {
    const { campaigns, spring, summer } = seed();
    const ava = makeInfluencer('ava');
    spring.inviteInfluencer(ava);
    spring.acceptInfluencer(ava);
    summer.inviteInfluencer(ava);

    expect(campaigns.getCampaignsForInfluencer(ava)).toEqual([spring]);
    expect(campaigns.getCampaignOffersForInfluencer(ava)).toEqual([summer]);
  });

  it('should filter by status ignoring case', () => {
    const { campaigns, spring, summer } = seed();
    spring.start();
    summer.end();

    expect(campaigns.getCampaignsByStatus('active')).toEqual([spring]);
    expect(campaigns.getActiveCampaigns()).toEqual([spring]);
    expect(campaigns.getCompletedCampaigns()).toEqual([summer]);
    expect(campaigns.getCampaignsByStatus(CampaignStatus.Draft)).toHaveLength(
      1,
    );
  });

  it('should find campaigns running entirely inside a date range', () => {
    const { campaigns, spring, summer } = seed();

    expect(
      campaigns.getCampaignsInDateRange('2026-03-01', '2026-05-31'),
    ).toEqual([spring]);
    expect(
      campaigns.getCampaignsInDateRange('2026-03-02', '2026-12-31'),
    ).toEqual([summer]);
  });

  it('should match nothing for a missing or malformed range', () => {
    const { campaigns } = seed();

    expect(campaigns.getCampaignsInDateRange('', '')).toEqual([]);
    expect(campaigns.getCampaignsInDateRange('2026-01-01', '')).toEqual([]);
    expect(campaigns.getCampaignsInDateRange(null, '2026-12-31')).toEqual([]);
    expect(campaigns.getCampaignsInDateRange('not-a-date', 'nope')).toEqual(
      [],
    );
    expect(
      campaigns.getCampaignsInDateRange('2026-01-01', '2026-02-30'),
    ).toEqual([]);
  });

  it('should skip campaigns with unparseable dates', () => {
    const { campaigns, spring, summer } = seed();
    summer.update({ endDate: 'late summer' });

    expect(
      campaigns.getCampaignsInDateRange('2026-01-01', '2026-12-31'),
    ).toEqual([spring]);
  });

  it('should search by name and budget', () => {
    const { campaigns, spring, summer, launch } = seed();

    expect(campaigns.getCampaignsByName('drop')).toEqual([spring, summer]);
    expect(campaigns.getCampaignsByName('')).toEqual([]);
    expect(campaigns.getCampaignsByBudgetRange(2000, 3000)).toEqual([
      spring,
      summer,
    ]);
    expect(campaigns.getCampaignsByBudgetRange(4000, 5000)).toEqual([launch]);
  });

  it('should rank campaigns by engagement', () => {
    const { campaigns, spring, summer } = seed();
    const ava = makeInfluencer('ava');
    spring.addInfluencer(ava);
    summer.addInfluencer(ava);
    spring.updateEngagementMetrics(ava, 100, 10, 0);
    summer.updateEngagementMetrics(ava, 500, 0, 0);

    expect(campaigns.getTopPerformingCampaigns(2)).toEqual([summer, spring]);
    expect(campaigns.getCampaignsWithHighEngagement(110)).toEqual([
      spring,
      summer,
    ]);
    expect(campaigns.getCampaignsWithHighEngagement(111)).toEqual([summer]);
  });

  it('should subtract active campaign budgets from the brand budget', () => {
    const { campaigns, northwind, spring } = seed();

    expect(campaigns.getRemainingBudget(northwind)).toBe(5000);

    northwind.completeCampaign(spring.id, 3000);

    expect(campaigns.getRemainingBudget(northwind)).toBe(8000);
  });

  it('should refuse to load a missing campaign list', () => {
    const { campaigns } = seed();

    const err = captureError(() => campaigns.setAllCampaigns(undefined));

    expect(err).toBeInstanceOf(DataProcessingError);
    expect(err).toMatchObject({ message: 'Campaign list cannot be null' });
  });

  it('should refuse campaigns without an id', () => {
    const { campaigns, northwind } = seed();
    const broken = new Campaign({ id: '', name: 'Broken', brand: northwind });

    expect(() => campaigns.setAllCampaigns([broken])).toThrow(
      'Campaign with empty id found',
    );
    expect(campaigns.getCampaignCount()).toBe(3);
  });

  it('should delete and clear campaigns', () => {
    const { campaigns, launch } = seed();

    expect(campaigns.deleteCampaign(launch.id)).toBe(true);
    expect(campaigns.deleteCampaign(launch.id)).toBe(false);

    campaigns.clearAllCampaigns();

    expect(campaigns.getAllCampaigns()).toEqual([]);
  });
});
