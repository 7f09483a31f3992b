import {
  Contract,
  Payment,
  simulatedGateway,
  type Brand,
  type Campaign,
  type Influencer,
  type PaymentGateway,
  type PaymentStatus,
  type UserRef,
} from '../entity';
import { contractTermsSchema, type ContractTerms } from './schema/campaigns';
import { parseInput } from './schema/common';

export interface CreateContractArgs {
  campaign: Campaign;
  influencer: Influencer;
  brand: Brand;
  terms?: ContractTerms;
}

export interface CreatePaymentArgs {
  amount?: number;
  currency?: string;
}

/**
 * Registry of contracts and the payments opened against them.
 */
export class ContractService {
  private readonly contracts = new Map<string, Contract>();
  private readonly payments = new Map<string, Payment>();
  private readonly gateway: PaymentGateway;

  constructor({
    gateway = simulatedGateway,
  }: { gateway?: PaymentGateway } = {}) {
    this.gateway = gateway;
  }

  /**
   * Drafts a contract for an influencer accepted in one of the brand's
   * campaigns. Returns undefined for any other pairing.
   */
  createContract({
    campaign,
    influencer,
    brand,
    terms = {},
  }: CreateContractArgs): Contract | undefined {
    const parsed = parseInput(contractTermsSchema, terms);

    if (
      campaign.brandUsername !== brand.username ||
      !campaign.isAccepted(influencer)
    ) {
      return undefined;
    }

    const contract = new Contract({
      campaign,
      influencer,
      brand,
      paymentAmount: parsed.paymentAmount,
      paymentTerms: parsed.paymentTerms,
      deliverables: parsed.deliverables,
      startDate: parsed.startDate,
      endDate: parsed.endDate,
    });
    this.contracts.set(contract.id, contract);

    return contract;
  }

  getContractById(id: string): Contract | undefined {
    return this.contracts.get(id);
  }

  getAllContracts(): Contract[] {
    return [...this.contracts.values()];
  }

  getContractsForCampaign(campaign: Pick<Campaign, 'id'>): Contract[] {
    return this.getAllContracts().filter(
      (contract) => contract.campaign.id === campaign.id,
    );
  }

  getContractsForInfluencer(influencer: UserRef): Contract[] {
    return this.getAllContracts().filter((contract) =>
      contract.influencer.equals(influencer),
    );
  }

  getContractsForBrand(brand: UserRef): Contract[] {
    return this.getAllContracts().filter((contract) =>
      contract.brand.equals(brand),
    );
  }

  /** Opens a pending payment. Unsigned contracts cannot be paid. */
  createPayment(
    contract: Contract,
    { amount, currency }: CreatePaymentArgs = {},
  ): Payment | undefined {
    if (!contract.isSigned) {
      return undefined;
    }

    const payment = new Payment({
      contract,
      amount,
      currency,
      gateway: this.gateway,
    });
    this.payments.set(payment.id, payment);

    return payment;
  }

  getPaymentById(id: string): Payment | undefined {
    return this.payments.get(id);
  }

  getAllPayments(): Payment[] {
    return [...this.payments.values()];
  }

  getPaymentsForContract(contract: Pick<Contract, 'id'>): Payment[] {
    return this.getAllPayments().filter(
      (payment) => payment.contract.id === contract.id,
    );
  }

  getPaymentsByStatus(status: PaymentStatus): Payment[] {
    return this.getAllPayments().filter(
      (payment) => payment.status === status,
    );
  }

  /** Returns how many payments went through. */
  processPayments(paymentMethod: string, payments: Payment[]): number {
    return payments.filter((payment) => payment.processPayment(paymentMethod))
      .length;
  }

  /** Returns how many payments were cancelled. */
  cancelPayments(reason: string, payments: Payment[]): number {
    return payments.filter((payment) => payment.cancelPayment(reason)).length;
  }
}
