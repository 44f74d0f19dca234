import {Discount, ReceiptItem} from '../domain';
import {Receipt} from './receipt';

/**
 * Renders a receipt as fixed-width text: a label on the left, an amount
 * right-aligned to `columns`, at least one space between the two.
 */
export class ReceiptPrinter {
    constructor(private readonly columns = 40) {}

    printReceipt(receipt: Receipt): string {
        const items = receipt.items.map(item => this.printReceiptItem(item));
        const discounts = receipt.discounts.map(discount => this.printDiscount(discount));
        return [...items, ...discounts, '\n', this.presentTotal(receipt)].join('');
    }

    printReceiptItem(item: ReceiptItem): string {
        const line = this.formatLineWithWhitespace(item.product.name, printPrice(item.totalPrice));
        if (item.quantity === 1) {
            return line;
        }
        return `${line}  ${printPrice(item.price)} * ${printQuantity(item)}\n`;
    }

    printDiscount(discount: Discount): string {
        const name = `${discount.description} (${discount.product.name})`;
        return this.formatLineWithWhitespace(name, printPrice(discount.discountAmount));
    }

    presentTotal(receipt: Receipt): string {
        return this.formatLineWithWhitespace('Total: ', printPrice(receipt.totalPrice()));
    }

    formatLineWithWhitespace(name: string, value: string): string {
        const whitespaceSize = Math.max(1, this.columns - name.length - value.length);
        return `${name}${' '.repeat(whitespaceSize)}${value}\n`;
    }
}

export function printPrice(price: number): string {
    return price.toFixed(2);
}

export function printQuantity(item: ReceiptItem): string {
    return item.product.unit === 'EACH' ? String(item.quantity) : item.quantity.toFixed(3);
}
