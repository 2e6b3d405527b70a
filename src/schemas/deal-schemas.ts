import { z } from 'zod';

// data/{deal}.json or io/{firm}/deals/{deal}/inputs/deal.json
export const DEAL_CONFIG_SCHEMA = z.object({
  company: z.string().min(1).optional(),
  url: z.string().min(1).optional(),
  description: z.string().optional(),
  stage: z.string().optional(),
  // pre-extracted deck text, relative to the deal file
  deck: z.string().optional(),
  // section keyword -> pre-extracted deck screenshots
  screenshots: z.record(z.string(), z.array(z.string())).optional(),
  trademarkLight: z.string().optional(),
  trademarkDark: z.string().optional(),
  outline: z.string().optional(),
  notes: z.string().optional(),
});

export type DealConfig = z.infer<typeof DEAL_CONFIG_SCHEMA>;
