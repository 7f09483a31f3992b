import { isUndefined, omitBy } from 'lodash';
import { v4 as uuidv4 } from 'uuid';
import { defaultDeliverables, defaultPaymentTerms } from '../config';
import { formatDocumentDate } from '../common/date';
import { formatCurrency } from '../common/number';
import type { Campaign } from './campaign/Campaign';
import type { Brand } from './user/Brand';
import type { Influencer } from './user/Influencer';

export enum ContractStatus {
  Draft = 'Draft',
  Active = 'Active',
  Completed = 'Completed',
  Terminated = 'Terminated',
}

export interface ContractProps {
  campaign: Campaign;
  influencer: Influencer;
  brand: Brand;
  paymentAmount?: number;
  paymentTerms?: string;
  deliverables?: string;
  startDate?: string | null;
  endDate?: string | null;
}

const heading = (title: string, underline: string): string[] => [
  title,
  underline.repeat(title.length),
];

export class Contract {
  readonly id: string;
  readonly campaign: Campaign;
  readonly influencer: Influencer;
  readonly brand: Brand;
  paymentAmount: number;
  paymentTerms: string;
  deliverables: string;
  startDate: string | null;
  endDate: string | null;
  status: ContractStatus;
  isSigned: boolean;
  terminationReason: string | null;
  readonly createdAt: Date;
  updatedAt: Date;

  /**
   * Dates are copied from the campaign and the payment amount defaults to the
   * influencer's rate at creation time, later rate changes do not apply.
   */
  constructor({
    campaign,
    influencer,
    brand,
    paymentAmount = influencer.rate,
    paymentTerms = defaultPaymentTerms,
    deliverables = defaultDeliverables,
    startDate = campaign.startDate,
    endDate = campaign.endDate,
  }: ContractProps) {
    this.id = uuidv4();
    this.campaign = campaign;
    this.influencer = influencer;
    this.brand = brand;
    this.paymentAmount = paymentAmount;
    this.paymentTerms = paymentTerms;
    this.deliverables = deliverables;
    this.startDate = startDate;
    this.endDate = endDate;
    this.status = ContractStatus.Draft;
    this.isSigned = false;
    this.terminationReason = null;
    this.createdAt = new Date();
    this.updatedAt = new Date(this.createdAt.getTime());
  }

  private touch(): void {
    this.updatedAt = new Date();
  }

  update(
    fields: Partial<
      Pick<
        Contract,
        'paymentAmount' | 'paymentTerms' | 'deliverables' | 'startDate' | 'endDate'
      >
    >,
  ): void {
    Object.assign(this, omitBy(fields, isUndefined));
    this.touch();
  }

  /** One-time gate, signing an already signed contract returns false. */
  signContract(): boolean {
    if (this.isSigned) {
      return false;
    }

    this.isSigned = true;
    this.status = ContractStatus.Active;
    this.touch();

    return true;
  }

  terminateContract(reason: string): boolean {
    if (this.status !== ContractStatus.Active) {
      return false;
    }

    this.status = ContractStatus.Terminated;
    this.terminationReason = reason;
    this.touch();

    return true;
  }

  completeContract(): boolean {
    if (this.status !== ContractStatus.Active) {
      return false;
    }

    this.status = ContractStatus.Completed;
    this.touch();

    return true;
  }

  generateContractDocument(): string {
    const lines = [
      ...heading('CONTRACT AGREEMENT', '='),
      '',
      `Contract ID: ${this.id}`,
      `Date Created: ${formatDocumentDate(this.createdAt)}`,
      '',
      ...heading('PARTIES', '-'),
      `Brand: ${this.brand.displayName}`,
      `Influencer: ${this.influencer.username}`,
      '',
      ...heading('CAMPAIGN DETAILS', '-'),
      `Campaign Name: ${this.campaign.name}`,
      `Description: ${this.campaign.description}`,
      `Duration: ${this.startDate ?? 'TBD'} to ${this.endDate ?? 'TBD'}`,
      '',
      ...heading('TERMS', '-'),
      `Deliverables: ${this.deliverables}`,
      '',
      `Payment Amount: ${formatCurrency(this.paymentAmount)}`,
      `Payment Terms: ${this.paymentTerms}`,
      '',
      ...heading('SIGNATURES', '-'),
      'Brand Representative: ____________________',
      '',
      'Influencer: ____________________',
    ];

    return `${lines.join('\n')}\n`;
  }

  summary(): string {
    return [
      `Contract ID: ${this.id}`,
      `Campaign: ${this.campaign.name}`,
      `Brand: ${this.brand.displayName}`,
      `Influencer: ${this.influencer.username}`,
      `Payment: ${formatCurrency(this.paymentAmount)}`,
      `Duration: ${this.startDate ?? 'TBD'} to ${this.endDate ?? 'TBD'}`,
      `Status: ${this.status}`,
      `Signed: ${this.isSigned ? 'Yes' : 'No'}`,
    ].join('\n');
  }
}
