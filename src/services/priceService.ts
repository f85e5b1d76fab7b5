import axios from 'axios';
import { AssetPrice, Clock, PriceFeedClient, systemClock } from '../types';
import { config } from '../config';
import { describeError, GasOptimizerError } from '../utils/errors';
import { logger } from '../utils/logger';
import { usdFromNumber } from '../utils/usd';

export interface PriceServiceSettings {
  coingeckoApiUrl: string;
  coinpaprikaApiUrl: string;
  /** Cache lifetime in minutes */
  cacheDuration: number;
}

interface PriceCache {
  [assetId: string]: {
    price: AssetPrice;
    fetchedAt: number;
  };
}

interface CoinGeckoSimplePrice {
  [coinId: string]: { usd?: number; last_updated_at?: number } | undefined;
}

interface CoinPaprikaTicker {
  last_updated?: string;
  quotes?: { USD?: { price?: number } };
}

// Assets whose price is pinned to 1 USD when every live source fails.
const STABLECOINS = new Set(['usd-coin', 'tether', 'dai']);

const COINPAPRIKA_IDS: Record<string, string> = {
  'ethereum': 'eth-ethereum',
  'polygon-ecosystem-token': 'pol-polygon-ecosystem-token',
  'matic-network': 'matic-polygon',
  'binancecoin': 'bnb-binance-coin',
  'avalanche-2': 'avax-avalanche',
  'usd-coin': 'usdc-usd-coin',
  'tether': 'usdt-tether',
};

/**
 * USD prices for native gas assets, keyed by CoinGecko coin id.
 * CoinGecko is the primary source; CoinPaprika is used when CoinGecko rate-limits.
 */
export class PriceService implements PriceFeedClient {
  private cache: PriceCache = {};
  private cacheDuration: number;

  constructor(
    private readonly settings: PriceServiceSettings = config.price,
    private readonly clock: Clock = systemClock
  ) {
    this.cacheDuration = settings.cacheDuration * 60;
  }

  async getUSDPrice(assetId: string): Promise<AssetPrice> {
    const cached = this.getCachedPrice(assetId);
    if (cached) {
      return cached;
    }

    const price = await this.fetchPriceFromCoinGecko(assetId);
    if (price.price <= 0n) {
      throw new GasOptimizerError('PriceFeedUnavailable', `Non-positive price returned for ${assetId}`, { assetId });
    }
    this.cache[assetId.toLowerCase()] = { price, fetchedAt: this.clock() };
    return price;
  }

  clearCache(): void {
    this.cache = {};
  }

  private getCachedPrice(assetId: string): AssetPrice | null {
    const cached = this.cache[assetId.toLowerCase()];
    if (!cached) return null;

    if (this.clock() - cached.fetchedAt > this.cacheDuration) {
      delete this.cache[assetId.toLowerCase()];
      return null;
    }

    return { ...cached.price, source: 'cache' };
  }

  private async fetchPriceFromCoinGecko(assetId: string): Promise<AssetPrice> {
    const url = `${this.settings.coingeckoApiUrl}/simple/price`;
    const params = {
      ids: assetId,
      vs_currencies: 'usd',
      include_last_updated_at: 'true',
    };

    try {
      logger.debug(`Fetching price from CoinGecko: ${url}?${new URLSearchParams(params).toString()}`);
      const response = await axios.get<CoinGeckoSimplePrice>(url, { params });
      const entry = response.data[assetId];

      if (!entry || entry.usd === undefined || entry.usd <= 0) {
        throw new GasOptimizerError('PriceFeedUnavailable', `No usable price returned for ${assetId}`, { assetId });
      }

      logger.debug(`Fetched price for ${assetId}: $${entry.usd}`);

      return {
        assetId,
        price: usdFromNumber(entry.usd),
        updatedAt: entry.last_updated_at ?? this.clock(),
        source: 'coingecko',
      };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 429) {
        logger.warn('CoinGecko rate limit hit, using fallback price source');
        return this.fetchPriceFromBackup(assetId);
      }
      if (error instanceof GasOptimizerError) {
        throw error;
      }
      logger.error(`CoinGecko API error for ${assetId}: ${describeError(error)}`);
      throw new GasOptimizerError('PriceFeedUnavailable', `CoinGecko request failed for ${assetId}: ${describeError(error)}`, {
        assetId,
      });
    }
  }

  private async fetchPriceFromBackup(assetId: string): Promise<AssetPrice> {
    const paprikaId = COINPAPRIKA_IDS[assetId.toLowerCase()];

    try {
      if (!paprikaId) {
        throw new GasOptimizerError('PriceFeedUnavailable', `No CoinPaprika mapping for ${assetId}`, { assetId });
      }

      const response = await axios.get<CoinPaprikaTicker>(`${this.settings.coinpaprikaApiUrl}/tickers/${paprikaId}`);
      const price = response.data.quotes?.USD?.price;

      if (price === undefined || price <= 0) {
        throw new GasOptimizerError('PriceFeedUnavailable', `No usable backup price for ${assetId}`, { assetId });
      }

      const lastUpdated = response.data.last_updated ? Date.parse(response.data.last_updated) : NaN;

      return {
        assetId,
        price: usdFromNumber(price),
        updatedAt: Number.isNaN(lastUpdated) ? this.clock() : Math.floor(lastUpdated / 1000),
        source: 'coinpaprika',
      };
    } catch (error) {
      if (STABLECOINS.has(assetId.toLowerCase())) {
        logger.warn(`Using fixed 1 USD price for ${assetId}: ${describeError(error)}`);
        return {
          assetId,
          price: usdFromNumber(1),
          updatedAt: this.clock(),
          source: 'fixed',
        };
      }
      logger.error(`Failed to fetch backup price for ${assetId}: ${describeError(error)}`);
      if (error instanceof GasOptimizerError) {
        throw error;
      }
      throw new GasOptimizerError('PriceFeedUnavailable', `Backup price request failed for ${assetId}: ${describeError(error)}`, {
        assetId,
      });
    }
  }
}
