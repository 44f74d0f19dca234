export {ShoppingCart} from './pure/cart';
export {OfferRegistry} from './pure/offerRegistry';
export {Receipt} from './pure/receipt';
export {InMemoryCatalog} from './pure/catalog';
export {Teller} from './pure/teller';
export {ReceiptPrinter} from './pure/receiptPrinter';
export {calculateDiscount, calculateDiscounts, checkout, crossSellRecommendations} from './pure/businessLogic';
export {processCheckout} from './pure/checkoutProcessing';
export {
    CheckoutError,
    InvalidOfferSpecError,
    InvalidProductError,
    InvalidQuantityError,
    UnknownProductError,
} from './pure/CheckoutError';
export {parseCsv, toRawRows} from './ingestion/csv';
export {readBasketRows, readCatalogRows, readOfferRows} from './ingestion/rows';
export {EffectsError} from './effects/EffectsError';
export {EffectsFactory, loadConfigFromEnv, makeAppEffects} from './effects/EffectsFactory';
export {createApp} from './server/app';
export type {Discount, Offer, Product, ProductQuantity, ProductUnit, ReceiptItem, SpecialOfferType} from './domain';
export type {CatalogEntry, IngestionResult, RawRow} from './types';
