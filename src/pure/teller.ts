import {Offer, Product, SpecialOfferType} from '../domain';
import {Catalog} from './types';
import {OfferRegistry} from './offerRegistry';
import {ShoppingCart} from './cart';
import {Receipt} from './receipt';
import {checkout} from './businessLogic';
import {CheckoutError} from './CheckoutError';
import {Either, Left, Maybe, Right} from 'purify-ts';

/**
 * Checkout counter. Owns the active offers and hands them, together with the
 * catalog, to the pricing logic for each cart it checks out.
 */
export class Teller {
    private readonly offers = new OfferRegistry();

    constructor(private readonly catalog: Catalog) {}

    addSpecialOffer(offerType: SpecialOfferType, product: Product | null | undefined, argument: number | null | undefined): void {
        this.offers.setOffer(offerType, product, argument);
    }

    get offerCount(): number {
        return this.offers.size;
    }

    activeOffers(): Offer[] {
        return this.offers.list();
    }

    productWithName(name: string): Maybe<Product> {
        return this.catalog.findByName(name);
    }

    /**
     * @throws UnknownProductError when the cart holds a product the catalog
     * does not price
     */
    checksOutArticlesFrom(cart: ShoppingCart): Receipt {
        return checkout(cart, this.catalog, this.offers);
    }

    /**
     * Same as `checksOutArticlesFrom`, with checkout failures returned as a
     * Left. Anything that is not a checkout failure is rethrown.
     */
    tryCheckout(cart: ShoppingCart): Either<CheckoutError, Receipt> {
        try {
            return Right(this.checksOutArticlesFrom(cart));
        } catch (error) {
            if (error instanceof CheckoutError) {
                return Left(error);
            }
            throw error;
        }
    }
}
