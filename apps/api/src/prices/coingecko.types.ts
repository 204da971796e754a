import { z } from 'zod';

// { bitcoin: { aud: 101234.5, aud_24h_change: -1.2 }, ... }
export const coinGeckoSimplePriceSchema = z.record(
  z.string(),
  z.record(z.string(), z.number().nullable()),
);

export type CoinGeckoSimplePrice = z.infer<typeof coinGeckoSimplePriceSchema>;

export const coinGeckoMarketsSchema = z.array(
  z.object({
    id: z.string(),
    symbol: z.string(),
    name: z.string(),
    current_price: z.number().nullable(),
    total_volume: z.number().nullable(),
    high_24h: z.number().nullable().optional(),
    low_24h: z.number().nullable().optional(),
    price_change_percentage_24h: z.number().nullable().optional(),
    price_change_percentage_7d_in_currency: z.number().nullable().optional(),
  }),
);

export type CoinGeckoMarket = z.infer<typeof coinGeckoMarketsSchema>[number];
