import { mock } from 'jest-mock-extended';
import {
  acceptInvitation,
  cancelCampaign,
  CampaignService,
  completeCampaign,
  createCampaign,
  declineInvitation,
  inviteInfluencer,
  settlePayments,
  type WorkflowContext,
} from '../../../src/common/campaign';
import { ContractService } from '../../../src/common/contract';
import {
  CampaignInfluencerStatus,
  CampaignStatus,
  ContractStatus,
  PaymentStatus,
  type PaymentGateway,
} from '../../../src/entity';
import { ValidationError } from '../../../src/errors';
import type { Logger } from '../../../src/logger';
import type { NotificationSink } from '../../../src/notifications';
import { captureError, makeBrand, makeInfluencer } from '../../helpers';

const createContext = (gateway: PaymentGateway = () => true) => {
  const notifications = mock<NotificationSink>();
  const log = mock<Logger>();
  const campaigns = new CampaignService();
  const contracts = new ContractService({ gateway });
  const ctx: WorkflowContext = { log, campaigns, contracts, notifications };

  return { ctx, notifications, log, campaigns, contracts };
};

const springInput = {
  name: 'Spring Drop',
  budget: 4000,
  startDate: '2026-03-01',
  endDate: '2026-03-31',
};

describe('createCampaign', () => {
  it('should register the campaign for the brand', () => {
    const { ctx, campaigns, log } = createContext();
    const brand = makeBrand('northwind');

    const campaign = createCampaign({ ctx, brand, input: springInput });

    expect(campaigns.getCampaignById(campaign.id)).toBe(campaign);
    expect(brand.activeCampaigns).toEqual([campaign.id]);
    expect(campaign.description).toBe('');
    expect(campaign.status).toBe(CampaignStatus.Draft);
    expect(log.info).toHaveBeenCalledWith(
      { campaignId: campaign.id, brand: 'northwind' },
      'campaign created',
    );
  });

  it('should reject a campaign ending before it starts', () => {
    const { ctx, campaigns } = createContext();

    const err = captureError(() =>
      createCampaign({
        ctx,
        brand: makeBrand('northwind'),
        input: { ...springInput, endDate: '2026-02-01' },
      }),
    );

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({
      message: 'Campaign cannot end before it starts',
    });
    expect(campaigns.getCampaignCount()).toBe(0);
  });

  it('should reject malformed dates', () => {
    const { ctx } = createContext();

    expect(() =>
      createCampaign({
        ctx,
        brand: makeBrand('northwind'),
        input: { ...springInput, startDate: '03/01/2026' },
      }),
    ).toThrow('Dates must use the YYYY-MM-DD format');
  });

  it('should reject an empty name', () => {
    const { ctx } = createContext();

    expect(() =>
      createCampaign({
        ctx,
        brand: makeBrand('northwind'),
        input: { ...springInput, name: '   ' },
      }),
    ).toThrow('Campaign name is required');
  });
});

describe('invitations', () => {
  it('should notify the influencer once per invitation', () => {
    const { ctx, notifications } = createContext();
    const brand = makeBrand('northwind');
    const ava = makeInfluencer('ava');
    const campaign = createCampaign({ ctx, brand, input: springInput });

    expect(inviteInfluencer({ ctx, campaign, influencer: ava })).toBe(true);
    expect(inviteInfluencer({ ctx, campaign, influencer: ava })).toBe(false);

    expect(notifications.addNotification).toHaveBeenCalledTimes(1);
    expect(notifications.addNotification).toHaveBeenCalledWith(
      'ava',
      'You have been invited to join the campaign "Spring Drop"',
    );
  });

  it('should notify the brand when an invitation is accepted', () => {
    const { ctx, notifications } = createContext();
    const brand = makeBrand('northwind');
    const ava = makeInfluencer('ava');
    const campaign = createCampaign({ ctx, brand, input: springInput });

    expect(acceptInvitation({ ctx, campaign, influencer: ava })).toBe(false);

    inviteInfluencer({ ctx, campaign, influencer: ava });

    expect(acceptInvitation({ ctx, campaign, influencer: ava })).toBe(true);
    expect(acceptInvitation({ ctx, campaign, influencer: ava })).toBe(false);
    expect(ava.activeCampaigns).toEqual([campaign.id]);
    expect(notifications.addNotification).toHaveBeenLastCalledWith(
      'northwind',
      'ava accepted your invitation to "Spring Drop"',
    );
  });

  it('should record a declined invitation', () => {
    const { ctx, notifications } = createContext();
    const brand = makeBrand('northwind');
    const ava = makeInfluencer('ava');
    const campaign = createCampaign({ ctx, brand, input: springInput });
    inviteInfluencer({ ctx, campaign, influencer: ava });

    expect(declineInvitation({ ctx, campaign, influencer: ava })).toBe(true);

    expect(campaign.getInfluencerStatus(ava)).toBe(
      CampaignInfluencerStatus.Declined,
    );
    expect(campaign.isAccepted(ava)).toBe(false);
    expect(notifications.addNotification).toHaveBeenLastCalledWith(
      'northwind',
      'ava declined your invitation to "Spring Drop"',
    );
  });
});

const runningCampaign = (ctx: WorkflowContext, contracts: ContractService) => {
  const brand = makeBrand('northwind');
  const ava = makeInfluencer('ava', { rate: 500 });
  const kai = makeInfluencer('kai', { rate: 300 });
  const zoe = makeInfluencer('zoe', { rate: 200 });
  const campaign = createCampaign({ ctx, brand, input: springInput });
  campaign.start();

  [ava, kai, zoe].forEach((influencer) => {
    inviteInfluencer({ ctx, campaign, influencer });
    acceptInvitation({ ctx, campaign, influencer });
  });
  const [avaContract, kaiContract, zoeContract] = [ava, kai, zoe].map(
    (influencer) => contracts.createContract({ campaign, influencer, brand }),
  );
  avaContract?.signContract();
  kaiContract?.signContract();

  return { brand, ava, kai, zoe, campaign, zoeContract };
};

describe('completeCampaign', () => {
  it('should complete signed contracts and open their payments', () => {
    const { ctx, contracts, notifications } = createContext();
    const { campaign, zoeContract } = runningCampaign(ctx, contracts);
    notifications.addNotification.mockClear();

    const { contracts: completed, payments } = completeCampaign({
      ctx,
      campaign,
    });

    expect(campaign.status).toBe(CampaignStatus.Completed);
    expect(completed.map(({ influencer }) => influencer.username)).toEqual([
      'ava',
      'kai',
    ]);
    expect(completed.map(({ status }) => status)).toEqual([
      ContractStatus.Completed,
      ContractStatus.Completed,
    ]);
    expect(zoeContract?.status).toBe(ContractStatus.Draft);
    expect(payments.map(({ amount }) => amount)).toEqual([500, 300]);
    expect(payments.map(({ status }) => status)).toEqual([
      PaymentStatus.Pending,
      PaymentStatus.Pending,
    ]);
    expect(notifications.addNotification.mock.calls).toEqual([
      ['northwind', 'Campaign "Spring Drop" has been completed'],
      ['ava', 'Campaign "Spring Drop" has been completed'],
      ['kai', 'Campaign "Spring Drop" has been completed'],
      ['zoe', 'Campaign "Spring Drop" has been completed'],
    ]);
  });
});

describe('cancelCampaign', () => {
  it('should terminate active contracts and tell every invitee', () => {
    const { ctx, contracts, notifications } = createContext();
    const { campaign, zoeContract } = runningCampaign(ctx, contracts);
    notifications.addNotification.mockClear();

    const terminated = cancelCampaign({
      ctx,
      campaign,
      reason: 'Budget cut',
    });

    expect(campaign.status).toBe(CampaignStatus.Cancelled);
    expect(terminated).toHaveLength(2);
    expect(terminated.map(({ terminationReason }) => terminationReason)).toEqual(
      ['Budget cut', 'Budget cut'],
    );
    expect(zoeContract?.status).toBe(ContractStatus.Draft);
    expect(notifications.addNotification).toHaveBeenCalledTimes(3);
    expect(notifications.addNotification).toHaveBeenCalledWith(
      'zoe',
      'Campaign "Spring Drop" has been cancelled: Budget cut',
    );
  });
});

describe('settlePayments', () => {
  it('should pay out and report declined payments to the brand', () => {
    const gateway = jest
      .fn<boolean, []>()
      .mockReturnValueOnce(true)
      .mockReturnValueOnce(false);
    const { ctx, contracts, notifications, log } = createContext(gateway);
    const { campaign, ava, kai } = runningCampaign(ctx, contracts);
    const { payments } = completeCampaign({ ctx, campaign });
    notifications.addNotification.mockClear();

    const settled = settlePayments({
      ctx,
      payments,
      paymentMethod: 'Bank Transfer',
    });

    expect(settled).toBe(1);
    expect(ava.totalEarnings).toBe(500);
    expect(kai.totalEarnings).toBe(0);
    expect(notifications.addNotification.mock.calls).toEqual([
      ['ava', 'Payment of USD 500.00 for "Spring Drop" has been completed'],
      [
        'northwind',
        'Payment of USD 300.00 to kai for "Spring Drop" failed',
      ],
    ]);
    expect(log.warn).toHaveBeenCalledWith(
      { paymentId: payments[1].id, status: PaymentStatus.Failed },
      'payment was not processed',
    );
  });
});
