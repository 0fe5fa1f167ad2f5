import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { CurrencyExchanger, CurrencyLookupError } from '../src/features/exchanger.js';
import { HttpError, type FetchLike } from '../src/utils/http.js';
import { MemoryBlobStore } from './helpers/fakes.js';

const NOW = Date.UTC(2026, 0, 2, 3, 4, 5);
const DAY = 24 * 60 * 60 * 1000;

function setup(response: () => Response = () => Response.json({ response: { rates: { USD: 1, EUR: 0.5, JPY: 150 } } })) {
  const store = new MemoryBlobStore();
  const urls: string[] = [];
  const clock = { now: NOW };
  const fetch: FetchLike = async (input) => {
    urls.push(input);
    return response();
  };
  const exchanger = new CurrencyExchanger({ apiKey: 'test-secret', store, fetch, now: () => clock.now });
  return { exchanger, store, urls, clock };
}

describe('CurrencyExchanger', () => {
  it('converts through USD rates', async () => {
    const { exchanger, urls } = setup();
    assert.deepEqual(await exchanger.convert(10, 'eur', 'jpy'), {
      amount: 10,
      from: 'EUR',
      to: 'JPY',
      result: 3000,
      updatedAt: '2026-01-02T03:04:05.000Z',
    });
    assert.deepEqual(urls, ['https://api.currencyscoop.com/v1/latest?api_key=test-secret&format=json']);
  });

  it('caches rates for a day', async () => {
    const { exchanger, store, urls, clock } = setup();
    await exchanger.convert(1, 'EUR');
    clock.now += DAY - 1;
    assert.equal((await exchanger.convert(1, 'EUR')).result, 2);
    assert.equal(urls.length, 1);
    clock.now += 1;
    await exchanger.convert(1, 'EUR');
    assert.equal(urls.length, 2);
    assert.equal(
      store.files.get('exchange_rates.json'),
      '{\n  "rates": {\n    "USD": 1,\n    "EUR": 0.5,\n    "JPY": 150\n  },\n  "updatedAt": "2026-01-03T03:04:05.000Z"\n}\n',
    );
  });

  it('fetches again when asked for the latest rates', async () => {
    const { exchanger, urls } = setup();
    await exchanger.convert(1, 'EUR');
    await exchanger.convert(1, 'EUR', 'USD', true);
    assert.equal(urls.length, 2);
  });

  it('rejects unknown codes', async () => {
    const { exchanger } = setup();
    await assert.rejects(exchanger.convert(1, 'xyz'), (error: unknown) => {
      assert.ok(error instanceof CurrencyLookupError);
      assert.equal(error.message, "unrecognized currency abbreviation 'XYZ'");
      return true;
    });
  });

  it('propagates API failures', async () => {
    const { exchanger } = setup(() => new Response('denied', { status: 401, statusText: 'Unauthorized' }));
    await assert.rejects(exchanger.convert(1, 'EUR'), HttpError);
  });

  it('keeps the API key out of failure messages', async () => {
    const { exchanger } = setup(() => new Response('denied', { status: 401, statusText: 'Unauthorized' }));
    await assert.rejects(exchanger.convert(1, 'EUR'), (error: unknown) => {
      assert.ok(error instanceof HttpError);
      assert.equal(error.message, 'HTTP 401 Unauthorized for https://api.currencyscoop.com/v1/latest');
      assert.equal(error.url, 'https://api.currencyscoop.com/v1/latest');
      return true;
    });
  });

  it('refuses a response without rates', async () => {
    const { exchanger, store } = setup(() => Response.json({ response: {} }));
    await assert.rejects(exchanger.updateRates(), { message: 'CurrencyScoop response has no rates' });
    assert.equal(store.writes, 0);
  });
});
