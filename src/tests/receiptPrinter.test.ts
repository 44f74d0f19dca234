import {Product} from '../domain';
import {Receipt} from '../pure/receipt';
import {ReceiptPrinter, printQuantity} from '../pure/receiptPrinter';

const toothbrush: Product = {name: 'toothbrush', unit: 'EACH'};
const apples: Product = {name: 'apples', unit: 'WEIGHT'};

describe('ReceiptPrinter', () => {
  it('right-aligns amounts to the column width', () => {
    const printer = new ReceiptPrinter();
    expect(printer.formatLineWithWhitespace('apples', '4.98')).toBe(`apples${' '.repeat(30)}4.98\n`);
  });

  it('keeps at least one space when the line overflows', () => {
    const printer = new ReceiptPrinter(10);
    expect(printer.formatLineWithWhitespace('cherry tomatoes', '0.69')).toBe('cherry tomatoes 0.69\n');
  });

  it('prints items, discounts and the total', () => {
    const receipt = new Receipt();
    receipt.addProduct(toothbrush, 1, 0.99, 0.99);
    receipt.addProduct(apples, 2.5, 2, 5);
    receipt.addDiscount({product: apples, description: '10% off', discountAmount: -0.5});

    expect(new ReceiptPrinter().printReceipt(receipt)).toBe(
      `toothbrush${' '.repeat(26)}0.99\n` +
      `apples${' '.repeat(30)}5.00\n` +
      '  2.00 * 2.500\n' +
      `10% off (apples)${' '.repeat(19)}-0.50\n` +
      '\n' +
      `Total: ${' '.repeat(29)}5.49\n`
    );
  });

  it('prints counted quantities as whole numbers', () => {
    const receipt = new Receipt();
    receipt.addProduct(toothbrush, 3, 0.5, 1.5);

    expect(new ReceiptPrinter().printReceiptItem(receipt.items[0])).toBe(
      `toothbrush${' '.repeat(26)}1.50\n  0.50 * 3\n`
    );
  });

  it('prints weighed quantities with three decimals', () => {
    expect(printQuantity({product: apples, quantity: 1.5, price: 1, totalPrice: 1.5})).toBe('1.500');
    expect(printQuantity({product: toothbrush, quantity: 2, price: 1, totalPrice: 2})).toBe('2');
  });

  it('prints an empty receipt as just the total', () => {
    expect(new ReceiptPrinter(20).printReceipt(new Receipt())).toBe(`\nTotal: ${' '.repeat(9)}0.00\n`);
  });
});
