import {CartSummary, Product, ProductQuantity} from '../domain';
import {InvalidProductError, InvalidQuantityError} from './CheckoutError';

/**
 * Accumulates purchased products. Entries are kept in insertion order for the
 * receipt lines; quantities are also aggregated per product, keyed by name, in
 * the order each product was first added.
 */
export class ShoppingCart {
    private readonly _items: ProductQuantity[] = [];
    private readonly _productQuantities = new Map<string, ProductQuantity>();

    get items(): readonly ProductQuantity[] {
        return this._items;
    }

    get productQuantities(): readonly ProductQuantity[] {
        return Array.from(this._productQuantities.values());
    }

    addItem(product: Product | null | undefined): void {
        this.addItemQuantity(product, 1);
    }

    addItemQuantity(product: Product | null | undefined, quantity: number): void {
        // also rejects NaN
        if (!(quantity > 0)) {
            throw new InvalidQuantityError(quantity);
        }
        if (product == null) {
            throw new InvalidProductError();
        }

        this._items.push({product, quantity});
        const current = this._productQuantities.get(product.name);
        this._productQuantities.set(product.name, {
            product: current?.product ?? product,
            quantity: current ? current.quantity + quantity : quantity,
        });
    }

    quantityOf(product: Product): number {
        return this._productQuantities.get(product.name)?.quantity ?? 0;
    }

    contains(product: Product): boolean {
        return this._productQuantities.has(product.name);
    }

    summary(): CartSummary {
        return {
            totalItems: this._items.length,
            totalProducts: this._productQuantities.size,
            totalQuantity: this.productQuantities.reduce((sum, pq) => sum + pq.quantity, 0),
        };
    }
}
