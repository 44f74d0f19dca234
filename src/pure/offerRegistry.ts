import {Offer, Product, SpecialOfferType} from '../domain';
import {InvalidOfferSpecError} from './CheckoutError';
import {Maybe} from 'purify-ts';

/**
 * Active offers keyed by product name. A product has at most one offer; the
 * last registration wins.
 */
export class OfferRegistry {
    private readonly offers = new Map<string, Offer>();

    setOffer(
        offerType: SpecialOfferType,
        product: Product | null | undefined,
        argument: number | null | undefined,
    ): void {
        if (product == null) {
            throw new InvalidOfferSpecError('product cannot be empty');
        }
        if (argument == null) {
            throw new InvalidOfferSpecError(`argument cannot be empty for ${product.name}`);
        }
        this.offers.set(product.name, {offerType, product, argument});
    }

    offerFor(product: Product): Maybe<Offer> {
        return Maybe.fromNullable(this.offers.get(product.name));
    }

    get size(): number {
        return this.offers.size;
    }

    list(): Offer[] {
        return Array.from(this.offers.values());
    }
}
