// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type PricingConfig = {
    readonly baseUrl: string;
    readonly timeoutMs: number;
}

export type CatalogSourceKind = 'csv' | 'postgres';

export type OfferSourceKind = 'csv' | 'http';

export type SourcesConfig = {
    readonly catalog: CatalogSourceKind;
    readonly offers: OfferSourceKind;
    readonly dataDir: string;
}

export type ReceiptConfig = {
    readonly columns: number;
}

export type ApiConfig = {
    readonly port: number;
}

export type AppConfig = {
    readonly database: DatabaseConfig;
    readonly pricing: PricingConfig;
    readonly sources: SourcesConfig;
    readonly receipt: ReceiptConfig;
    readonly api: ApiConfig;
}
