// Domain types shared across the application

export type ProductUnit = 'EACH' | 'WEIGHT';

export type Product = {
  readonly name: string;
  readonly unit: ProductUnit;
};

export type ProductQuantity = {
  readonly product: Product;
  readonly quantity: number;
};

export type SpecialOfferType =
  | 'THREE_FOR_TWO'
  | 'TWO_FOR_AMOUNT'
  | 'FIVE_FOR_AMOUNT'
  | 'TEN_PERCENT_DISCOUNT';

export type Offer = {
  readonly offerType: SpecialOfferType;
  readonly product: Product;
  readonly argument: number;
};

export type ReceiptItem = {
  readonly product: Product;
  readonly quantity: number;
  readonly price: number;
  readonly totalPrice: number;
};

export type Discount = {
  readonly product: Product;
  readonly description: string;
  readonly discountAmount: number;
};

export type CartSummary = {
  readonly totalItems: number;
  readonly totalProducts: number;
  readonly totalQuantity: number;
};
