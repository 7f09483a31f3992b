import type {
  Brand,
  Campaign,
  Contract,
  Influencer,
  Payment,
} from '../../entity';
import { CampaignInfluencerStatus } from '../../entity';
import type { Logger } from '../../logger';
import type { NotificationSink } from '../../notifications/types';
import { formatAmount } from '../number';
import { campaignInputSchema, type CampaignInput } from '../schema/campaigns';
import { parseInput } from '../schema/common';
import type { ContractService } from '../contract';
import type { CampaignService } from './common';

export interface WorkflowContext {
  log: Logger;
  campaigns: Pick<CampaignService, 'addCampaign'>;
  contracts: Pick<ContractService, 'getContractsForCampaign' | 'createPayment'>;
  notifications: NotificationSink;
}

interface CampaignMemberArgs {
  ctx: WorkflowContext;
  campaign: Campaign;
  influencer: Influencer;
}

export interface CampaignCompletion {
  contracts: Contract[];
  payments: Payment[];
}

export const createCampaign = ({
  ctx,
  brand,
  input,
}: {
  ctx: WorkflowContext;
  brand: Brand;
  input: CampaignInput;
}): Campaign => {
  const campaign = brand.createCampaign(parseInput(campaignInputSchema, input));
  ctx.campaigns.addCampaign(campaign);

  ctx.log.info(
    { campaignId: campaign.id, brand: brand.username },
    'campaign created',
  );

  return campaign;
};

export const inviteInfluencer = ({
  ctx,
  campaign,
  influencer,
}: CampaignMemberArgs): boolean => {
  if (campaign.isInvited(influencer)) {
    return false;
  }

  campaign.inviteInfluencer(influencer);
  ctx.notifications.addNotification(
    influencer.username,
    `You have been invited to join the campaign "${campaign.name}"`,
  );
  ctx.log.info(
    { campaignId: campaign.id, influencer: influencer.username },
    'influencer invited',
  );

  return true;
};

export const acceptInvitation = ({
  ctx,
  campaign,
  influencer,
}: CampaignMemberArgs): boolean => {
  if (!campaign.isInvited(influencer) || campaign.isAccepted(influencer)) {
    return false;
  }

  campaign.acceptInfluencer(influencer);
  ctx.notifications.addNotification(
    campaign.brandUsername,
    `${influencer.username} accepted your invitation to "${campaign.name}"`,
  );

  return true;
};

export const declineInvitation = ({
  ctx,
  campaign,
  influencer,
}: CampaignMemberArgs): boolean => {
  if (!campaign.isInvited(influencer) || campaign.isAccepted(influencer)) {
    return false;
  }

  campaign.updateInfluencerStatus(
    influencer,
    CampaignInfluencerStatus.Declined,
  );
  ctx.notifications.addNotification(
    campaign.brandUsername,
    `${influencer.username} declined your invitation to "${campaign.name}"`,
  );

  return true;
};

/**
 * Ends the campaign, completes its active contracts and opens a pending
 * payment for each of them.
 */
export const completeCampaign = ({
  ctx,
  campaign,
}: {
  ctx: WorkflowContext;
  campaign: Campaign;
}): CampaignCompletion => {
  campaign.end();

  const contracts = ctx.contracts
    .getContractsForCampaign(campaign)
    .filter((contract) => contract.completeContract());
  const payments = contracts.flatMap((contract) => {
    const payment = ctx.contracts.createPayment(contract);
    return payment ? [payment] : [];
  });

  ctx.notifications.addNotification(
    campaign.brandUsername,
    `Campaign "${campaign.name}" has been completed`,
  );
  campaign.acceptedInfluencers.forEach((username) =>
    ctx.notifications.addNotification(
      username,
      `Campaign "${campaign.name}" has been completed`,
    ),
  );

  ctx.log.info(
    {
      campaignId: campaign.id,
      contracts: contracts.length,
      payments: payments.length,
    },
    'campaign completed',
  );

  return { contracts, payments };
};

export const cancelCampaign = ({
  ctx,
  campaign,
  reason,
}: {
  ctx: WorkflowContext;
  campaign: Campaign;
  reason: string;
}): Contract[] => {
  campaign.cancel();

  const terminated = ctx.contracts
    .getContractsForCampaign(campaign)
    .filter((contract) => contract.terminateContract(reason));

  campaign.invitedInfluencers.forEach((username) =>
    ctx.notifications.addNotification(
      username,
      `Campaign "${campaign.name}" has been cancelled: ${reason}`,
    ),
  );

  ctx.log.info(
    { campaignId: campaign.id, terminated: terminated.length, reason },
    'campaign cancelled',
  );

  return terminated;
};

/**
 * Charges each payment once. The influencer hears about successful payouts,
 * the brand about declined ones. Returns how many went through.
 */
export const settlePayments = ({
  ctx,
  payments,
  paymentMethod,
}: {
  ctx: WorkflowContext;
  payments: Payment[];
  paymentMethod: string;
}): number =>
  payments.filter((payment) => {
    const amount = `${payment.currency} ${formatAmount(payment.amount)}`;

    if (payment.processPayment(paymentMethod)) {
      ctx.notifications.addNotification(
        payment.influencer.username,
        `Payment of ${amount} for "${payment.campaign.name}" has been completed`,
      );
      return true;
    }

    ctx.log.warn(
      { paymentId: payment.id, status: payment.status },
      'payment was not processed',
    );
    ctx.notifications.addNotification(
      payment.brand.username,
      `Payment of ${amount} to ${payment.influencer.username} for "${payment.campaign.name}" failed`,
    );
    return false;
  }).length;
