import { z } from 'zod';

export const swyftxAuthSchema = z.object({
  accessToken: z.string().min(1),
});

export const swyftxBalanceSchema = z.array(
  z.object({
    assetId: z.coerce.number().int(),
    availableBalance: z.union([z.string(), z.number()]),
  }),
);

export type SwyftxBalance = z.infer<typeof swyftxBalanceSchema>[number];
