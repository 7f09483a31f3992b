import { v4 as uuidv4 } from 'uuid';
import { defaultCurrency, paymentSuccessRate } from '../config';
import { formatDocumentDate } from '../common/date';
import { formatAmount } from '../common/number';
import type { Campaign } from './campaign/Campaign';
import type { Contract } from './Contract';
import type { Brand } from './user/Brand';
import type { Influencer } from './user/Influencer';

export enum PaymentStatus {
  Pending = 'Pending',
  Processing = 'Processing',
  Completed = 'Completed',
  Failed = 'Failed',
  Cancelled = 'Cancelled',
}

/** Decides whether a charge attempt goes through. */
export type PaymentGateway = () => boolean;

export const simulatedGateway: PaymentGateway = () =>
  Math.random() < paymentSuccessRate;

export interface PaymentProps {
  contract: Contract;
  amount?: number;
  currency?: string;
  paymentMethod?: string | null;
  gateway?: PaymentGateway;
}

export const NO_RECEIPT_MESSAGE =
  'Payment not completed yet. No receipt available.';

const generateTransactionId = (): string =>
  `TX-${uuidv4().slice(0, 8).toUpperCase()}`;

export class Payment {
  readonly id: string;
  readonly contract: Contract;
  readonly campaign: Campaign;
  readonly influencer: Influencer;
  readonly brand: Brand;
  amount: number;
  currency: string;
  status: PaymentStatus;
  paymentMethod: string | null;
  transactionId: string | null;
  paymentDate: Date | null;
  cancellationReason: string | null;
  readonly createdAt: Date;

  private readonly gateway: PaymentGateway;

  constructor({
    contract,
    amount = contract.paymentAmount,
    currency = defaultCurrency,
    paymentMethod = null,
    gateway = simulatedGateway,
  }: PaymentProps) {
    this.id = uuidv4();
    this.contract = contract;
    this.campaign = contract.campaign;
    this.influencer = contract.influencer;
    this.brand = contract.brand;
    this.amount = amount;
    this.currency = currency;
    this.status = PaymentStatus.Pending;
    this.paymentMethod = paymentMethod;
    this.transactionId = null;
    this.paymentDate = null;
    this.cancellationReason = null;
    this.createdAt = new Date();
    this.gateway = gateway;
  }

  canProcess(): boolean {
    return (
      this.status === PaymentStatus.Pending ||
      this.status === PaymentStatus.Failed
    );
  }

  /**
   * Charges the payment through the gateway. A declined attempt leaves the
   * payment Failed, retrying is up to the caller.
   */
  processPayment(paymentMethod: string): boolean {
    if (!this.canProcess()) {
      return false;
    }

    this.paymentMethod = paymentMethod;
    this.status = PaymentStatus.Processing;

    if (!this.gateway()) {
      this.status = PaymentStatus.Failed;
      return false;
    }

    this.status = PaymentStatus.Completed;
    this.paymentDate = new Date();
    this.transactionId = generateTransactionId();

    this.influencer.completeCampaign(this.campaign.id, this.amount);
    this.brand.completeCampaign(this.campaign.id, this.amount);

    return true;
  }

  cancelPayment(reason: string): boolean {
    if (this.status === PaymentStatus.Completed) {
      return false;
    }

    this.status = PaymentStatus.Cancelled;
    this.cancellationReason = reason;

    return true;
  }

  generateReceipt(): string {
    if (this.status !== PaymentStatus.Completed || !this.paymentDate) {
      return NO_RECEIPT_MESSAGE;
    }

    const lines = [
      'PAYMENT RECEIPT',
      '===============',
      '',
      `Receipt ID: ${this.id}`,
      `Transaction ID: ${this.transactionId}`,
      `Date: ${formatDocumentDate(this.paymentDate)}`,
      '',
      'PAYMENT DETAILS',
      '---------------',
      `Campaign: ${this.campaign.name}`,
      `Brand: ${this.brand.displayName}`,
      `Influencer: ${this.influencer.username}`,
      `Amount: ${this.currency} ${formatAmount(this.amount)}`,
      `Payment Method: ${this.paymentMethod}`,
      `Status: ${this.status}`,
      '',
      'Thank you for using the influencer marketplace!',
    ];

    return `${lines.join('\n')}\n`;
  }
}
