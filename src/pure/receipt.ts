import {Discount, Product, ReceiptItem} from '../domain';

export class Receipt {
    private readonly _items: ReceiptItem[] = [];
    private readonly _discounts: Discount[] = [];

    get items(): readonly ReceiptItem[] {
        return this._items;
    }

    get discounts(): readonly Discount[] {
        return this._discounts;
    }

    // Recomputed on every call
    totalPrice(): number {
        const itemsTotal = this._items.reduce((sum, item) => sum + item.totalPrice, 0);
        return this._discounts.reduce((sum, discount) => sum + discount.discountAmount, itemsTotal);
    }

    addProduct(product: Product, quantity: number, price: number, totalPrice: number): void {
        this._items.push({product, quantity, price, totalPrice});
    }

    addDiscount(discount: Discount): void {
        this._discounts.push(discount);
    }
}
