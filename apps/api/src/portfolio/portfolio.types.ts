import { z } from 'zod';

export const portfolioAssetSchema = z.object({
  asset_id: z.number(),
  code: z.string(),
  name: z.string(),
  balance: z.number(),
  last_price: z.number(),
  value_primary: z.number(),
  value_secondary: z.number(),
  change_24h: z.number(),
  color: z.string(),
});

/** Response of GET /api/portfolio, also what gets cached. */
export const portfolioSummarySchema = z.object({
  total_primary_value: z.number(),
  total_secondary_value: z.number(),
  total_change_24h: z.number(), // value-weighted, percent
  assets: z.array(portfolioAssetSchema),
  last_updated: z.string(), // ISO-8601
});

export type PortfolioAsset = z.infer<typeof portfolioAssetSchema>;
export type PortfolioSummary = z.infer<typeof portfolioSummarySchema>;
