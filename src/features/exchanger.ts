import { JsonDocument, StorageKeys, type BlobStore } from '../storage/blob-store.js';
import { isFiniteNumber, isRecord } from '../utils/guards.js';
import { fetchJson, type FetchLike } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('exchanger');

const STALE_AFTER_MS = 24 * 60 * 60 * 1000;

export const SUPPORTED_CURRENCIES_URL = 'https://currencyscoop.com/supported-currencies';

/**
 * 通貨コードが見つからない
 */
export class CurrencyLookupError extends Error {
  readonly code: string;

  constructor(code: string) {
    super(`unrecognized currency abbreviation '${code}'`);
    this.name = 'CurrencyLookupError';
    this.code = code;
  }
}

/**
 * USD 基準の為替レートと取得時刻
 */
export interface RateTable {
  rates: Record<string, number>;
  /** ISO 8601 */
  updatedAt: string;
}

export interface Conversion {
  amount: number;
  from: string;
  to: string;
  result: number;
  updatedAt: string;
}

function parseRateTable(value: unknown): RateTable | null {
  if (!isRecord(value)) return null;
  const rates = value['rates'];
  const updatedAt = value['updatedAt'];
  if (!isRecord(rates) || typeof updatedAt !== 'string') return null;
  const table: Record<string, number> = {};
  for (const [code, rate] of Object.entries(rates)) {
    if (isFiniteNumber(rate)) table[code] = rate;
  }
  return { rates: table, updatedAt };
}

export interface CurrencyExchangerOptions {
  apiKey: string;
  store: BlobStore;
  fetch?: FetchLike;
  now?: () => number;
}

/**
 * CurrencyScoop のレートを exchange_rates.json にキャッシュして換算する
 * 無料枠は月 5000 リクエストなので 1 日に 1 回だけ取得する
 */
export class CurrencyExchanger {
  private apiKey: string;
  private document: JsonDocument<RateTable | null>;
  private fetch: FetchLike | undefined;
  private now: () => number;

  constructor(options: CurrencyExchangerOptions) {
    this.apiKey = options.apiKey;
    this.document = new JsonDocument<RateTable | null>(options.store, StorageKeys.exchangeRates, parseRateTable, () => null);
    this.fetch = options.fetch;
    this.now = options.now ?? Date.now;
  }

  private get url(): string {
    return `https://api.currencyscoop.com/v1/latest?${new URLSearchParams({ api_key: this.apiKey, format: 'json' }).toString()}`;
  }

  async updateRates(): Promise<RateTable> {
    log.warn('Requesting latest rates from CurrencyScoop (usage is limited to 5000 requests/month)');
    const data = await fetchJson(this.url, { fetch: this.fetch });
    const response = isRecord(data) ? data['response'] : undefined;
    const table = parseRateTable({
      rates: isRecord(response) ? response['rates'] : undefined,
      updatedAt: new Date(this.now()).toISOString(),
    });
    if (!table || Object.keys(table.rates).length === 0) {
      throw new Error('CurrencyScoop response has no rates');
    }
    await this.document.save(table);
    log.info(`Updated ${StorageKeys.exchangeRates} with ${Object.keys(table.rates).length} rates`);
    return table;
  }

  private async currentRates(forceUpdate: boolean): Promise<RateTable> {
    const cached = await this.document.load();
    if (!forceUpdate && cached) {
      const age = this.now() - Date.parse(cached.updatedAt);
      if (Number.isFinite(age) && age < STALE_AFTER_MS) return cached;
    }
    return this.updateRates();
  }

  /**
   * Throws CurrencyLookupError for an unknown code; fetch failures propagate as is
   */
  async convert(amount: number, from: string, to = 'USD', forceUpdate = false): Promise<Conversion> {
    const fromCode = from.toUpperCase();
    const toCode = to.toUpperCase();
    const table = await this.currentRates(forceUpdate);
    const fromRate = table.rates[fromCode];
    if (fromRate === undefined) throw new CurrencyLookupError(fromCode);
    const toRate = table.rates[toCode];
    if (toRate === undefined) throw new CurrencyLookupError(toCode);
    return { amount, from: fromCode, to: toCode, result: (amount * toRate) / fromRate, updatedAt: table.updatedAt };
  }
}
