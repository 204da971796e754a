import type { AssetDescriptor } from '@holdings/valuation';

// Swyftx asset ids. AUD is the primary currency, so it prices at 1.
export const ASSET_DESCRIPTORS: readonly AssetDescriptor[] = [
  { id: 1, code: 'AUD', name: 'Australian Dollar', color: '#00843D', fixedPrice: 1 },
  { id: 3, code: 'BTC', name: 'Bitcoin', color: '#F7931A', coingeckoId: 'bitcoin' },
  { id: 5, code: 'ETH', name: 'Ethereum', color: '#627EEA', coingeckoId: 'ethereum' },
  { id: 6, code: 'XRP', name: 'XRP', color: '#23292F', coingeckoId: 'ripple' },
  { id: 12, code: 'ADA', name: 'Cardano', color: '#0033AD', coingeckoId: 'cardano' },
  { id: 73, code: 'DOGE', name: 'Dogecoin', color: '#C2A633', coingeckoId: 'dogecoin' },
  { id: 130, code: 'SOL', name: 'Solana', color: '#9945FF', coingeckoId: 'solana' },
  { id: 405, code: 'USDT', name: 'Tether', color: '#26A17B', coingeckoId: 'tether' },
  { id: 547, code: 'USDC', name: 'USD Coin', color: '#2775CA', coingeckoId: 'usd-coin' },
  { id: 619, code: 'LINK', name: 'Chainlink', color: '#2A5ADA', coingeckoId: 'chainlink' },
];

export const ASSET_DESCRIPTORS_TOKEN = Symbol('ASSET_DESCRIPTORS');
