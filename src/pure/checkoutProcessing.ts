/**
 * CHECKOUT PROCESSOR - The Coordinator
 *
 * The thin effectful shell around the pricing core:
 * 1. Calls effects to get catalog and offer rows
 * 2. Ingests rows into a catalog snapshot, a teller and a cart
 * 3. Runs the pure checkout
 */

import {AppEffects} from './effects';
import {RawRow} from '../types';
import {InMemoryCatalog} from './catalog';
import {ShoppingCart} from './cart';
import {Receipt} from './receipt';
import {Teller} from './teller';
import {readBasketRows, readCatalogRows, readOfferRows} from '../ingestion/rows';
import {EffectsError} from '../effects/EffectsError';
import {Either, EitherAsync, Left, NonEmptyList, Right} from 'purify-ts';

export const EMPTY_CART = 'Shopping cart is empty';

export type CheckoutResult = {
    readonly receipt: Receipt;
    readonly warnings: string[];
};

export type CheckoutRows = {
    readonly catalogRows: RawRow[];
    readonly offerRows: RawRow[];
};

type CheckoutInputs = {
    readonly teller: Teller;
    readonly cart: ShoppingCart;
    readonly warnings: string[];
};

/**
 * Check out the given basket rows against the catalog and offers supplied by
 * the effects.
 *
 * @return a function taking the app effects and resolving to either the
 * reasons no receipt could be produced or the receipt with the warnings
 * collected while reading rows
 * @throws EffectsError when a row source fails
 */
export function processCheckout(
    basketRows: RawRow[]
): (appEffects: AppEffects) => Promise<Either<NonEmptyList<string>, CheckoutResult>> {
    return async (appEffects: AppEffects) => {
        const rows = await fetchCheckoutRows(appEffects);
        return buildCheckoutInputs(rows, basketRows).chain(({teller, cart, warnings}) =>
            teller.tryCheckout(cart)
                .mapLeft(error => NonEmptyList([error.message]))
                .map(receipt => ({receipt, warnings}))
        );
    };
}

/**
 * Load catalog and offer rows in parallel. Every source must succeed.
 */
async function fetchCheckoutRows(appEffects: AppEffects): Promise<CheckoutRows> {
    const [catalogRows, offerRows] = await Promise.all([
        EitherAsync<unknown, RawRow[]>(() => appEffects.catalog.getCatalogRows()).run(),
        EitherAsync<unknown, RawRow[]>(() => appEffects.offers.getOfferRows()).run(),
    ]);
    const errors = Either.lefts([catalogRows, offerRows])
        .map(err => (err instanceof Error) ? err : new Error(String(err)));
    if (errors.length) throw new EffectsError(errors);

    return {
        catalogRows: catalogRows.orDefault([]),
        offerRows: offerRows.orDefault([]),
    };
}

/**
 * Pure: rows in, teller and cart out. Bad rows become warnings; only an empty
 * cart is a failure.
 */
export function buildCheckoutInputs(
    {catalogRows, offerRows}: CheckoutRows,
    basketRows: RawRow[],
): Either<NonEmptyList<string>, CheckoutInputs> {
    const catalogResult = readCatalogRows(catalogRows);
    const catalog = InMemoryCatalog.fromEntries(catalogResult.values);

    const teller = new Teller(catalog);
    const offerResult = readOfferRows(offerRows, catalog);
    offerResult.values.forEach(offer => teller.addSpecialOffer(offer.offerType, offer.product, offer.argument));

    const cart = new ShoppingCart();
    const basketResult = readBasketRows(basketRows, catalog);
    basketResult.values.forEach(item => cart.addItemQuantity(item.product, item.quantity));

    const warnings = [...catalogResult.warnings, ...offerResult.warnings, ...basketResult.warnings];
    if (cart.items.length === 0) {
        return Left(NonEmptyList([EMPTY_CART, ...warnings]));
    }
    return Right({teller, cart, warnings});
}
