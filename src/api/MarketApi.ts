// src/api/MarketApi.ts

import { BaseApi } from './BaseApi';
import { CsvSchema } from './schemas';
import type { Exchange, HistoricalInterval, HistoricalOptions, TransactionType } from './types';

export class MarketApi extends BaseApi {
  /**
   * Full market quotes
   *
   * @param instruments - `EXCHANGE:TRADINGSYMBOL` or instrument tokens
   */
  async quote(instruments: readonly string[]): Promise<unknown> {
    return this.call('quote', { query: { i: instruments } });
  }

  async ohlc(instruments: readonly string[]): Promise<unknown> {
    return this.call('ohlc', { query: { i: instruments } });
  }

  async ltp(instruments: readonly string[]): Promise<unknown> {
    return this.call('ltp', { query: { i: instruments } });
  }

  async historicalData(
    instrumentToken: string | number,
    interval: HistoricalInterval,
    from: Date | string,
    to: Date | string,
    options: HistoricalOptions = {}
  ): Promise<unknown> {
    return this.call('historicalData', {
      segments: [String(instrumentToken), interval],
      query: {
        from: formatTimestamp(from),
        to: formatTimestamp(to),
        continuous: options.continuous ? 1 : 0,
        oi: options.oi ? 1 : 0,
      },
    });
  }

  /**
   * Instrument master as CSV. Served from the response cache when enabled.
   */
  async instruments(exchange?: Exchange): Promise<string> {
    return this.callFor(CsvSchema, 'instruments', {
      segments: exchange ? [exchange] : [],
    });
  }

  async mfInstruments(): Promise<string> {
    return this.callFor(CsvSchema, 'mfInstruments');
  }

  async triggerRange(transactionType: TransactionType, instruments: readonly string[]): Promise<unknown> {
    return this.call('triggerRange', {
      segments: [transactionType.toLowerCase()],
      query: { i: instruments },
    });
  }

  async instrumentMargins(segment: string): Promise<unknown> {
    return this.call('marketMargins', { segments: [segment] });
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `yyyy-mm-dd hh:mm:ss` in local time; strings pass through untouched
 */
export function formatTimestamp(value: Date | string): string {
  if (typeof value === 'string') return value;

  const date = `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  const time = `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
  return `${date} ${time}`;
}
