import type { MarketDataGateway, NewsSource, ProviderType } from './types';
import { FinnhubClient } from './finnhub/client';
import { FinnhubMarketDataGateway } from './finnhub/provider';

/**
 * Create the market data gateway based on ENV configuration.
 *
 * ENV:
 * - MARKET_DATA_PROVIDER: 'finnhub'
 * - FINNHUB_API_KEY
 *
 * Default: 'finnhub'
 */
export function createMarketDataGateway(
  providerType?: ProviderType,
  apiKey: string | null = process.env.FINNHUB_API_KEY ?? null
): MarketDataGateway & NewsSource {
  const type = providerType ?? process.env.MARKET_DATA_PROVIDER ?? 'finnhub';

  switch (type) {
    case 'finnhub': {
      if (!apiKey) {
        throw new Error('FINNHUB_API_KEY environment variable is required');
      }
      return new FinnhubMarketDataGateway(new FinnhubClient(apiKey));
    }
    default:
      throw new Error(`Unknown provider type: ${type}`);
  }
}
