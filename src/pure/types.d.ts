// Module product types

import {Product} from "../domain";
import {Maybe} from "purify-ts";

/**
 * Price lookup used during checkout. `unitPrice` throws
 * `UnknownProductError` for a product it does not carry.
 */
export interface Catalog {
    unitPrice(product: Product): number;
    findByName(name: string): Maybe<Product>;
}

export type DiscountTerms = {
    readonly description: string;
    readonly amount: number;
};
