/**
 * PURE PRICING LOGIC
 *
 * These functions take values and return values. The only state they touch is
 * the receipt they create, and it never escapes before it is complete.
 *
 * Prices are plain numbers; rounding to cents happens when a receipt is
 * printed, never during calculation.
 */

import {Discount, Product, ProductQuantity, SpecialOfferType} from '../domain';
import {Catalog, DiscountTerms} from './types';
import {OfferRegistry} from './offerRegistry';
import {Receipt} from './receipt';
import {ShoppingCart} from './cart';
import {Maybe} from 'purify-ts';

// ============================================================================
// Discount Rules
// ============================================================================

type DiscountRule = (
    quantity: number,
    unitPrice: number,
    argument: Maybe<number>,
) => Maybe<DiscountTerms>;

function threeForTwo(quantity: number, unitPrice: number): Maybe<DiscountTerms> {
    const units = Math.floor(quantity);
    return Maybe.fromPredicate(u => u > 2, units).map(u => ({
        description: '3 for 2',
        amount: -(Math.floor(u / 3) * unitPrice),
    }));
}

/**
 * `bundleSize` units sell for `argument`; units left over are charged at the
 * unit price. Counting uses whole units, the shelf price uses the exact
 * quantity.
 */
function bundleForAmount(bundleSize: number): DiscountRule {
    return (quantity, unitPrice, argument) => {
        const units = Math.floor(quantity);
        return argument
            .filter(bundlePrice => bundlePrice > 0)
            .filter(() => units >= bundleSize)
            .map(bundlePrice => {
                const paid = Math.floor(units / bundleSize) * bundlePrice + (units % bundleSize) * unitPrice;
                return {
                    description: `${bundleSize} for ${bundlePrice}`,
                    amount: paid - quantity * unitPrice,
                };
            });
    };
}

function percentageOff(quantity: number, unitPrice: number, argument: Maybe<number>): Maybe<DiscountTerms> {
    return argument
        .filter(percentage => percentage > 0)
        .map(percentage => ({
            description: `${percentage}% off`,
            amount: -(quantity * unitPrice * percentage / 100),
        }));
}

const discountRules: Record<SpecialOfferType, DiscountRule> = {
    THREE_FOR_TWO: (quantity, unitPrice) => threeForTwo(quantity, unitPrice),
    TWO_FOR_AMOUNT: bundleForAmount(2),
    FIVE_FOR_AMOUNT: bundleForAmount(5),
    TEN_PERCENT_DISCOUNT: percentageOff,
};

/**
 * Price reduction for `quantity` units of one product under one offer.
 *
 * Nothing is returned when the offer does not apply: too few units, a missing
 * or non-finite argument, or terms that would raise the price. Terms that
 * exactly match the shelf price still apply, with an amount of 0.
 */
export function calculateDiscount(
    offerType: SpecialOfferType,
    quantity: number,
    unitPrice: number,
    argument: number | null,
): Maybe<DiscountTerms> {
    const usableArgument = Maybe.fromNullable(argument).filter(Number.isFinite);
    return discountRules[offerType](quantity, unitPrice, usableArgument)
        .filter(terms => terms.amount <= 0);
}

export function toDiscount(product: Product, terms: DiscountTerms): Discount {
    return {
        product,
        description: terms.description,
        discountAmount: terms.amount,
    };
}

/**
 * One discount at most per product, in the order products were first added.
 */
export function calculateDiscounts(
    productQuantities: readonly ProductQuantity[],
    catalog: Catalog,
    offers: OfferRegistry,
): Discount[] {
    return Maybe.catMaybes(productQuantities.map(({product, quantity}) =>
        offers.offerFor(product).chain(offer =>
            calculateDiscount(offer.offerType, quantity, catalog.unitPrice(product), offer.argument)
                .map(terms => toDiscount(product, terms)))));
}

// ============================================================================
// Checkout
// ============================================================================

/**
 * Price every cart entry and apply the active offers.
 *
 * @throws UnknownProductError when a cart product has no catalog price; no
 * receipt is produced in that case
 */
export function checkout(cart: ShoppingCart, catalog: Catalog, offers: OfferRegistry): Receipt {
    const receipt = new Receipt();

    for (const {product, quantity} of cart.items) {
        const unitPrice = catalog.unitPrice(product);
        receipt.addProduct(product, quantity, unitPrice, quantity * unitPrice);
    }

    calculateDiscounts(cart.productQuantities, catalog, offers)
        .forEach(discount => receipt.addDiscount(discount));

    return receipt;
}

// ============================================================================
// Cart Analytics
// ============================================================================

/**
 * "Customers who bought this also bought": products associated with what is
 * already in the cart, skipping anything the cart holds. At most `limit`.
 */
export function crossSellRecommendations(
    cart: ShoppingCart,
    associations: Readonly<Record<string, readonly Product[]>>,
    limit = 3,
): Product[] {
    const recommended = new Map<string, Product>();
    for (const {product} of cart.productQuantities) {
        for (const associated of associations[product.name] ?? []) {
            if (!cart.contains(associated) && !recommended.has(associated.name)) {
                recommended.set(associated.name, associated);
            }
        }
    }
    return Array.from(recommended.values()).slice(0, limit);
}
