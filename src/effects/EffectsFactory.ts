/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * Real row sources for the checkout:
 * - CSV files in a data directory (catalog.csv, offers.csv)
 * - PostgreSQL for the product catalog
 * - the pricing service HTTP API for active offers
 */
import {AppEffects, CatalogSource, OfferSource} from '../pure/effects';
import {RawRow} from '../types';
import {parseCsv, toRawRows} from '../ingestion/csv';
import {AppConfig, DatabaseConfig, PricingConfig} from './types';
import {Pool} from 'pg';
import axios, {AxiosInstance} from 'axios';
import {promises as fs} from 'fs';
import path from 'path';

export const CATALOG_FILE = 'catalog.csv';
export const OFFERS_FILE = 'offers.csv';
export const CART_FILE = 'cart.csv';

// ============================================================================
// Configuration
// ============================================================================

function oneOf<T extends string>(variable: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new Error(`Unsupported ${variable} '${value}', expected one of ${allowed.join(', ')}`);
  }
  return match;
}

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    database: {
      host: env.DATABASE_HOST || 'localhost',
      port: parseInt(env.DATABASE_PORT || '5432', 10),
      user: env.DATABASE_USER || 'appuser',
      password: env.DATABASE_PASSWORD || 'apppassword',
      database: env.DATABASE_NAME || 'supermarket',
    },
    pricing: {
      baseUrl: env.PRICING_API_URL || 'http://localhost:8081',
      timeoutMs: parseInt(env.PRICING_TIMEOUT_MS || '5000', 10),
    },
    sources: {
      catalog: oneOf('CATALOG_SOURCE', env.CATALOG_SOURCE || 'csv', ['csv', 'postgres'] as const),
      offers: oneOf('OFFERS_SOURCE', env.OFFERS_SOURCE || 'csv', ['csv', 'http'] as const),
      dataDir: env.DATA_DIR || process.cwd(),
    },
    receipt: {
      columns: parseInt(env.RECEIPT_COLUMNS || '40', 10),
    },
    api: {
      port: parseInt(env.API_PORT || '3000', 10),
    },
  };
}

// ============================================================================
// CSV Files
// ============================================================================

/**
 * Read a CSV file into raw rows. A missing file is not an error: it yields no
 * rows, the same as an empty file.
 */
export async function readCsvFile(file: string): Promise<RawRow[]> {
  try {
    const text = await fs.readFile(file, 'utf-8');
    return parseCsv(text);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      console.log(`Info: ${file} not found, no rows loaded`);
      return [];
    }
    console.error(`Failed to read ${file}:`, error);
    throw new Error(`Could not read ${path.basename(file)}`);
  }
}

class CsvFileCatalogSource implements CatalogSource {
  constructor(private readonly file: string) {}

  getCatalogRows = (): Promise<RawRow[]> => readCsvFile(this.file);
}

class CsvFileOfferSource implements OfferSource {
  constructor(private readonly file: string) {}

  getOfferRows = (): Promise<RawRow[]> => readCsvFile(this.file);
}

// ============================================================================
// PostgreSQL Catalog Source
// ============================================================================

type ProductRow = {
  name: string;
  unit: string;
  price: string;
};

export class PostgresCatalogSource implements CatalogSource {
  constructor(private readonly pool: Pick<Pool, 'connect'>) {}

  getCatalogRows = async (): Promise<RawRow[]> => {
    const client = await this.pool.connect();
    try {
      const result = await client.query<ProductRow>(
        'SELECT name, unit, price FROM products ORDER BY name'
      );
      return toRawRows(result.rows);
    } catch (error) {
      console.error('Failed to load catalog:', error);
      throw new Error('Catalog database unavailable');
    } finally {
      client.release();
    }
  };
}

// ============================================================================
// Axios Offer Source
// ============================================================================

export function createPricingClient(config: PricingConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
  });
}

export class AxiosOfferSource implements OfferSource {
  constructor(private readonly client: Pick<AxiosInstance, 'get'>) {}

  getOfferRows = async (): Promise<RawRow[]> => {
    let payload: unknown;
    try {
      const response = await this.client.get<unknown>('/api/offers');
      payload = response.data;
    } catch (error) {
      console.error('Failed to fetch offers:', error);
      throw new Error('Pricing service unavailable');
    }
    if (!Array.isArray(payload)) {
      throw new Error('Pricing service returned an unexpected offers payload');
    }
    return toRawRows(payload);
  };
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

export class EffectsFactory implements AppEffects {
  private _pool?: Pool;
  private _catalogSource?: CatalogSource;
  private _offerSource?: OfferSource;

  constructor(private config: AppConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = createPool(this.config.database);

      // Test database connection
      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  get catalog(): CatalogSource {
    if (!this._catalogSource) {
      if (this.config.sources.catalog === 'postgres') {
        if (!this._pool) {
          throw new Error('Database pool not initialized. Call initialize() first.');
        }
        this._catalogSource = new PostgresCatalogSource(this._pool);
      } else {
        this._catalogSource = new CsvFileCatalogSource(path.join(this.config.sources.dataDir, CATALOG_FILE));
      }
    }
    return this._catalogSource;
  }

  get offers(): OfferSource {
    if (!this._offerSource) {
      this._offerSource = this.config.sources.offers === 'http'
        ? new AxiosOfferSource(createPricingClient(this.config.pricing))
        : new CsvFileOfferSource(path.join(this.config.sources.dataDir, OFFERS_FILE));
    }
    return this._offerSource;
  }

  /**
   * Open the connections the configured sources need.
   * Must be called before using the effects.
   */
  async initialize(): Promise<void> {
    if (this.config.sources.catalog === 'postgres') {
      await this.getPool();
    }
    console.log(`✅ Effects initialized (catalog: ${this.config.sources.catalog}, offers: ${this.config.sources.offers})`);
  }

  async close(): Promise<void> {
    if (this._pool) {
      await this._pool.end();
      this._pool = undefined;
      this._catalogSource = undefined;
    }
  }

  /**
   * Static factory method to create and initialize production effects
   */
  static async make(config?: AppConfig): Promise<EffectsFactory> {
    const cfg = config || loadConfigFromEnv();
    const effects = new EffectsFactory(cfg);
    await effects.initialize();
    return effects;
  }
}

function createPool(config: DatabaseConfig): Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
}

// Export a factory function
export async function makeAppEffects(config?: AppConfig): Promise<EffectsFactory> {
  return EffectsFactory.make(config);
}
