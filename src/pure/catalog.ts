import {Product} from '../domain';
import {CatalogEntry} from '../types';
import {Catalog} from './types';
import {UnknownProductError} from './CheckoutError';
import {Maybe} from 'purify-ts';

/**
 * Catalog snapshot held in memory for the duration of a checkout. Products are
 * keyed by name; adding a product twice replaces its price.
 */
export class InMemoryCatalog implements Catalog {
    private readonly entries = new Map<string, CatalogEntry>();

    static fromEntries(entries: CatalogEntry[]): InMemoryCatalog {
        const catalog = new InMemoryCatalog();
        entries.forEach(entry => catalog.addProduct(entry.product, entry.unitPrice));
        return catalog;
    }

    addProduct(product: Product, unitPrice: number): void {
        this.entries.set(product.name, {product, unitPrice});
    }

    get products(): Product[] {
        return Array.from(this.entries.values(), entry => entry.product);
    }

    unitPrice(product: Product): number {
        const entry = this.entries.get(product.name);
        if (!entry) {
            throw new UnknownProductError(product.name);
        }
        return entry.unitPrice;
    }

    findByName(name: string): Maybe<Product> {
        return Maybe.fromNullable(this.entries.get(name)).map(entry => entry.product);
    }
}
