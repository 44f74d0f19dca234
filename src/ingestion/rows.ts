/**
 * ROW INGESTION
 *
 * Turns loosely validated rows into catalog entries, offers and cart entries.
 * Unlike the checkout core, nothing here throws on bad data: a row that cannot
 * be used is skipped and a warning naming its line is collected instead.
 */

import {Offer, ProductQuantity, ProductUnit, SpecialOfferType} from '../domain';
import {CatalogEntry, IngestionResult, RawRow} from '../types';
import {Catalog} from '../pure/types';
import {Either, Left, Maybe, Right} from 'purify-ts';

export const MAX_UNIT_PRICE = 100000;
export const MAX_QUANTITY = 1000;

const UNITS: Readonly<Record<string, ProductUnit>> = {
    EACH: 'EACH',
    WEIGHT: 'WEIGHT',
    KILO: 'WEIGHT',
};

export const OFFER_TYPES: readonly SpecialOfferType[] = [
    'THREE_FOR_TWO',
    'TWO_FOR_AMOUNT',
    'FIVE_FOR_AMOUNT',
    'TEN_PERCENT_DISCOUNT',
];

type Warn = (message: string) => void;

function field(row: RawRow, name: string): Maybe<string> {
    return Maybe.fromNullable(row.fields[name])
        .map(value => value.trim())
        .filter(value => value.length > 0);
}

function parseNumber(text: string): Maybe<number> {
    return Maybe.of(Number(text)).filter(value => !Number.isNaN(value));
}

function parseUnit(text: string): Maybe<ProductUnit> {
    return Maybe.fromNullable(UNITS[text.toUpperCase()]);
}

function parseOfferType(text: string): Maybe<SpecialOfferType> {
    const upper = text.toUpperCase();
    return Maybe.fromNullable(OFFER_TYPES.find(offerType => offerType === upper));
}

function ingest<T>(
    rows: readonly RawRow[],
    convert: (row: RawRow, warn: Warn) => Either<string, T>,
): IngestionResult<T> {
    const values: T[] = [];
    const warnings: string[] = [];
    const warn: Warn = message => {
        warnings.push(message);
    };

    for (const row of rows) {
        convert(row, warn).caseOf({
            Left: warn,
            Right: value => {
                values.push(value);
            },
        });
    }
    return {values, warnings};
}

// ============================================================================
// Catalog
// ============================================================================

function toCatalogEntry(row: RawRow): Either<string, CatalogEntry> {
    const {line} = row;
    const name = field(row, 'name').extract();
    if (name === undefined) {
        return Left(`Missing product name in line ${line}, skipping`);
    }
    const unitText = field(row, 'unit').extract();
    if (unitText === undefined) {
        return Left(`Missing unit in line ${line} for product '${name}', skipping`);
    }
    const priceText = field(row, 'price').extract();
    if (priceText === undefined) {
        return Left(`Missing price in line ${line} for product '${name}', skipping`);
    }

    const unit = parseUnit(unitText).extract();
    if (unit === undefined) {
        return Left(`Invalid unit '${unitText}' for product '${name}' in line ${line}. Must be EACH or WEIGHT. Skipping.`);
    }
    const price = parseNumber(priceText).extract();
    if (price === undefined) {
        return Left(`Invalid price '${priceText}' for product '${name}' in line ${line}. Skipping.`);
    }
    if (price < 0) {
        return Left(`Negative price ${price} for product '${name}' in line ${line}. Skipping.`);
    }
    if (price > MAX_UNIT_PRICE) {
        return Left(`Unrealistically high price ${price} for product '${name}' in line ${line}. Skipping.`);
    }

    return Right({product: {name, unit}, unitPrice: price});
}

export function readCatalogRows(rows: readonly RawRow[]): IngestionResult<CatalogEntry> {
    return ingest(rows, toCatalogEntry);
}

// ============================================================================
// Offers
// ============================================================================

/**
 * Offers must name a catalog product. A missing argument counts as 0 and an
 * unreadable one is replaced by 0 with a warning; the pricing rules treat 0
 * as "no discount" for every offer that needs an argument.
 */
export function readOfferRows(rows: readonly RawRow[], catalog: Catalog): IngestionResult<Offer> {
    return ingest(rows, (row, warn): Either<string, Offer> => {
        const {line} = row;
        const name = field(row, 'name').extract();
        if (name === undefined) {
            return Left(`Missing product name in offers line ${line}, skipping`);
        }
        const offerText = field(row, 'offer').extract();
        if (offerText === undefined) {
            return Left(`Missing offer type in line ${line}, skipping`);
        }
        const product = catalog.findByName(name).extract();
        if (product === undefined) {
            return Left(`Product '${name}' not found in catalog in offers line ${line}. Skipping.`);
        }
        const offerType = parseOfferType(offerText).extract();
        if (offerType === undefined) {
            return Left(`Invalid offer type '${offerText}' in line ${line}. Must be one of ${OFFER_TYPES.join(', ')}. Skipping.`);
        }

        const argument = field(row, 'argument').caseOf({
            Nothing: () => 0,
            Just: text => parseNumber(text).orDefaultLazy(() => {
                warn(`Invalid argument '${text}' in line ${line}. Using 0.`);
                return 0;
            }),
        });

        return Right({offerType, product, argument});
    });
}

// ============================================================================
// Basket
// ============================================================================

export function readBasketRows(rows: readonly RawRow[], catalog: Catalog): IngestionResult<ProductQuantity> {
    return ingest(rows, (row): Either<string, ProductQuantity> => {
        const {line} = row;
        const name = field(row, 'name').extract();
        if (name === undefined) {
            return Left(`Missing product name in cart line ${line}, skipping`);
        }
        const quantityText = field(row, 'quantity').extract();
        if (quantityText === undefined) {
            return Left(`Missing quantity in line ${line}, skipping`);
        }
        const product = catalog.findByName(name).extract();
        if (product === undefined) {
            return Left(`Product '${name}' not found in catalog (cart line ${line}). Skipping.`);
        }

        const quantity = parseNumber(quantityText).extract();
        if (quantity === undefined) {
            return Left(`Invalid quantity '${quantityText}' for product '${name}' in line ${line}. Skipping.`);
        }
        if (quantity <= 0) {
            return Left(`Non-positive quantity ${quantity} for product '${name}' in line ${line}. Skipping.`);
        }
        if (quantity > MAX_QUANTITY) {
            return Left(`Unrealistically high quantity ${quantity} for product '${name}' in line ${line}. Skipping.`);
        }

        return Right({product, quantity});
    });
}
