import { z } from 'zod';
import { calendarDateSchema } from './common';

export const campaignInputSchema = z
  .object({
    name: z.string().trim().min(1, { error: 'Campaign name is required' }),
    description: z.string().default(''),
    budget: z.number().nonnegative({ error: 'Budget cannot be negative' }),
    startDate: calendarDateSchema.nullish(),
    endDate: calendarDateSchema.nullish(),
  })
  .refine(
    ({ startDate, endDate }) => !startDate || !endDate || startDate <= endDate,
    { error: 'Campaign cannot end before it starts', path: ['endDate'] },
  );

export type CampaignInput = z.input<typeof campaignInputSchema>;

export const contractTermsSchema = z.object({
  paymentAmount: z
    .number()
    .nonnegative({ error: 'Payment amount cannot be negative' })
    .optional(),
  paymentTerms: z.string().trim().min(1).optional(),
  deliverables: z.string().trim().min(1).optional(),
  startDate: calendarDateSchema.nullish(),
  endDate: calendarDateSchema.nullish(),
});

export type ContractTerms = z.input<typeof contractTermsSchema>;
