import {
  Contract,
  NO_RECEIPT_MESSAGE,
  Payment,
  PaymentStatus,
  type PaymentGateway,
} from '../../src/entity';
import { makeBrand, makeInfluencer } from '../helpers';

const setup = (gateway: PaymentGateway) => {
  const brand = makeBrand('northwind', { companyName: 'Northwind Outfitters' });
  const influencer = makeInfluencer('ava', { rate: 500 });
  const campaign = brand.createCampaign({ name: 'Spring Drop', budget: 4000 });
  campaign.addInfluencer(influencer);
  const contract = new Contract({ campaign, influencer, brand });
  contract.signContract();
  const payment = new Payment({ contract, gateway });

  return { brand, influencer, campaign, contract, payment };
};

describe('payment', () => {
  it('should default to the contract amount in USD', () => {
    const { payment } = setup(() => true);

    expect(payment.amount).toBe(500);
    expect(payment.currency).toBe('USD');
    expect(payment.status).toBe(PaymentStatus.Pending);
  });

  it('should complete and book the amount on both sides', () => {
    const { payment, influencer, brand, campaign } = setup(() => true);

    expect(payment.processPayment('Card')).toBe(true);

    expect(payment.status).toBe(PaymentStatus.Completed);
    expect(payment.paymentMethod).toBe('Card');
    expect(payment.transactionId).toMatch(/^TX-[0-9A-F]{8}$/);
    expect(payment.paymentDate).toBeInstanceOf(Date);
    expect(influencer.totalEarnings).toBe(500);
    expect(influencer.pastCampaigns).toEqual([campaign.id]);
    expect(brand.totalSpent).toBe(500);
    expect(brand.pastCampaigns).toEqual([campaign.id]);
  });

  it('should fail without side effects and allow a retry', () => {
    const gateway = jest
      .fn<boolean, []>()
      .mockReturnValueOnce(false)
      .mockReturnValueOnce(true);
    const { payment, influencer, brand } = setup(gateway);

    expect(payment.processPayment('Card')).toBe(false);
    expect(payment.status).toBe(PaymentStatus.Failed);
    expect(payment.transactionId).toBeNull();
    expect(influencer.totalEarnings).toBe(0);
    expect(brand.totalSpent).toBe(0);
    expect(payment.generateReceipt()).toBe(NO_RECEIPT_MESSAGE);

    expect(payment.processPayment('Bank Transfer')).toBe(true);
    expect(payment.status).toBe(PaymentStatus.Completed);
    expect(influencer.totalEarnings).toBe(500);
  });

  it('should not charge a completed payment twice', () => {
    const gateway = jest.fn<boolean, []>().mockReturnValue(true);
    const { payment, influencer } = setup(gateway);
    payment.processPayment('Card');

    expect(payment.processPayment('Card')).toBe(false);
    expect(gateway).toHaveBeenCalledTimes(1);
    expect(influencer.totalEarnings).toBe(500);
  });

  it('should not cancel a completed payment', () => {
    const { payment } = setup(() => true);
    payment.processPayment('Card');

    expect(payment.cancelPayment('Changed mind')).toBe(false);
    expect(payment.status).toBe(PaymentStatus.Completed);
    expect(payment.cancellationReason).toBeNull();
  });

  it('should cancel a pending payment and refuse to process it', () => {
    const gateway = jest.fn<boolean, []>().mockReturnValue(true);
    const { payment } = setup(gateway);

    expect(payment.cancelPayment('Campaign cancelled')).toBe(true);
    expect(payment.status).toBe(PaymentStatus.Cancelled);
    expect(payment.cancellationReason).toBe('Campaign cancelled');
    expect(payment.processPayment('Card')).toBe(false);
    expect(gateway).not.toHaveBeenCalled();
  });

  it('should render the receipt once completed', () => {
    const { payment } = setup(() => true);
    payment.processPayment('Card');

    const lines = payment.generateReceipt().split('\n');

    expect(lines.slice(0, 5)).toEqual([
      'PAYMENT RECEIPT',
      '===============',
      '',
      `Receipt ID: ${payment.id}`,
      `Transaction ID: ${payment.transactionId}`,
    ]);
    expect(lines.slice(7)).toEqual([
      'PAYMENT DETAILS',
      '---------------',
      'Campaign: Spring Drop',
      'Brand: Northwind Outfitters',
      'Influencer: ava',
      'Amount: USD 500.00',
      'Payment Method: Card',
      'Status: Completed',
      '',
      'Thank you for using the influencer marketplace!',
      '',
    ]);
  });

  it('should book brand spend only with the first completed payment of a campaign', () => {
    const { brand, campaign, influencer, payment } = setup(() => true);
    const kai = makeInfluencer('kai', { rate: 300 });
    campaign.addInfluencer(kai);
    const kaiContract = new Contract({ campaign, influencer: kai, brand });
    kaiContract.signContract();
    const kaiPayment = new Payment({
      contract: kaiContract,
      gateway: () => true,
    });

    payment.processPayment('Card');
    kaiPayment.processPayment('Card');

    expect(influencer.totalEarnings).toBe(500);
    expect(kai.totalEarnings).toBe(300);
    expect(brand.totalSpent).toBe(500);
  });
});
