/**
 * ROW SOURCE TESTS
 *
 * The PostgreSQL and HTTP sources against in-process stand-ins for the pool
 * and the pricing client.
 */

import {AxiosOfferSource, PostgresCatalogSource} from '../effects/EffectsFactory';

beforeEach(() => {
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

function createMockPool(query: jest.Mock) {
  const client = {query, release: jest.fn()};
  return {pool: {connect: jest.fn().mockResolvedValue(client)}, client};
}

describe('PostgresCatalogSource', () => {
  it('maps product rows to numbered raw rows', async () => {
    const {pool, client} = createMockPool(jest.fn().mockResolvedValue({
      rows: [
        {name: 'apples', unit: 'WEIGHT', price: '1.99'},
        {name: 'rice', unit: 'EACH', price: '2.00'},
      ],
    }));

    const rows = await new PostgresCatalogSource(pool).getCatalogRows();

    expect(rows).toEqual([
      {line: 1, fields: {name: 'apples', unit: 'WEIGHT', price: '1.99'}},
      {line: 2, fields: {name: 'rice', unit: 'EACH', price: '2.00'}},
    ]);
    expect(client.query).toHaveBeenCalledWith('SELECT name, unit, price FROM products ORDER BY name');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('releases the client and reports the database unavailable when the query fails', async () => {
    const {pool, client} = createMockPool(jest.fn().mockRejectedValue(new Error('relation "products" does not exist')));

    await expect(new PostgresCatalogSource(pool).getCatalogRows())
      .rejects.toThrow('Catalog database unavailable');
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});

describe('AxiosOfferSource', () => {
  it('fetches offers and maps them to numbered raw rows', async () => {
    const client = {
      get: jest.fn().mockResolvedValue({
        data: [{name: 'rice', offer: 'TWO_FOR_AMOUNT', argument: 3}],
      }),
    };

    const rows = await new AxiosOfferSource(client).getOfferRows();

    expect(client.get).toHaveBeenCalledWith('/api/offers');
    expect(rows).toEqual([
      {line: 1, fields: {name: 'rice', offer: 'TWO_FOR_AMOUNT', argument: '3'}},
    ]);
  });

  it('reports the pricing service unavailable when the request fails', async () => {
    const client = {get: jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED'))};

    await expect(new AxiosOfferSource(client).getOfferRows())
      .rejects.toThrow('Pricing service unavailable');
  });

  it('rejects a payload that is not an array', async () => {
    const client = {get: jest.fn().mockResolvedValue({data: {offers: []}})};

    await expect(new AxiosOfferSource(client).getOfferRows())
      .rejects.toThrow('Pricing service returned an unexpected offers payload');
  });
});
