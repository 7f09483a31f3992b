import { z } from 'zod';

const accountSchema = z.object({
  username: z.string().trim().min(1, { error: 'Username is required' }),
  email: z.email({ error: 'Email is invalid' }),
  password: z.string().min(1, { error: 'Password is required' }),
});

export const influencerInputSchema = accountSchema.extend({
  niche: z.string().trim().min(1).nullish(),
  bio: z.string().nullish(),
  rate: z.number().nonnegative({ error: 'Rate cannot be negative' }).default(0),
});

export const brandInputSchema = accountSchema.extend({
  companyName: z.string().trim().min(1).nullish(),
  industry: z.string().trim().min(1).nullish(),
  website: z.url({ error: 'Website must be a valid URL' }).nullish(),
  description: z.string().nullish(),
  budget: z
    .number()
    .nonnegative({ error: 'Budget cannot be negative' })
    .default(0),
});

export const advertiserInputSchema = accountSchema.extend({
  agencyName: z.string().trim().min(1).nullish(),
  contactPerson: z.string().nullish(),
  phone: z.string().nullish(),
  commission: z.number().min(0).max(100).optional(),
});

export const adminInputSchema = accountSchema;

export type InfluencerInput = z.input<typeof influencerInputSchema>;
export type BrandInput = z.input<typeof brandInputSchema>;
export type AdvertiserInput = z.input<typeof advertiserInputSchema>;
export type AdminInput = z.input<typeof adminInputSchema>;
