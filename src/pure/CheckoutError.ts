/**
 * Failures raised by the checkout core. Each one is surfaced at the call that
 * introduced the bad value; nothing is clamped or retried.
 */
export class CheckoutError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CheckoutError';
    }
}

export class InvalidQuantityError extends CheckoutError {
    constructor(readonly quantity: number) {
        super(`Quantity must be positive, got ${quantity}`);
        this.name = 'InvalidQuantityError';
    }
}

export class InvalidProductError extends CheckoutError {
    constructor() {
        super('Please provide a valid product');
        this.name = 'InvalidProductError';
    }
}

export class InvalidOfferSpecError extends CheckoutError {
    constructor(reason: string) {
        super(`Invalid offer: ${reason}`);
        this.name = 'InvalidOfferSpecError';
    }
}

export class UnknownProductError extends CheckoutError {
    constructor(readonly productName: string) {
        super(`Product '${productName}' not found in catalog`);
        this.name = 'UnknownProductError';
    }
}
