/**
 * CHECKOUT API
 *
 * HTTP front for the checkout shell. The effects are injected so tests can
 * hand in stand-ins for the catalog and offer sources.
 */
import {AppEffects} from '../pure/effects';
import {processCheckout} from '../pure/checkoutProcessing';
import {Receipt} from '../pure/receipt';
import {ReceiptPrinter} from '../pure/receiptPrinter';
import {toRawRows} from '../ingestion/csv';
import {EffectsError} from '../effects/EffectsError';
import express, {Express} from 'express';

export function toReceiptJson(receipt: Receipt, printer: ReceiptPrinter) {
  return {
    items: receipt.items.map(item => ({
      name: item.product.name,
      unit: item.product.unit,
      quantity: item.quantity,
      unitPrice: item.price,
      totalPrice: item.totalPrice,
    })),
    discounts: receipt.discounts.map(discount => ({
      name: discount.product.name,
      description: discount.description,
      amount: discount.discountAmount,
    })),
    total: receipt.totalPrice(),
    receipt: printer.printReceipt(receipt),
  };
}

export function createApp(appEffects: AppEffects, printer = new ReceiptPrinter()): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({status: 'healthy', service: 'supermarket-checkout'});
  });

  /**
   * POST /api/checkout
   *
   * Body: { items: [{ name, quantity }] }
   * Prices the items against the current catalog and offers.
   */
  app.post('/api/checkout', async (req, res) => {
    const items: unknown = req.body?.items;
    if (!Array.isArray(items)) {
      res.status(400).json({error: 'Request body must contain an items array'});
      return;
    }

    try {
      const result = await processCheckout(toRawRows(items))(appEffects);
      result.caseOf({
        Left: (errors) => {
          console.warn(`⚠️  Checkout rejected: ${errors[0]}`);
          res.status(422).json({errors});
        },
        Right: ({receipt, warnings}) => {
          console.log(`✅ Checked out ${receipt.items.length} items, total ${receipt.totalPrice().toFixed(2)}`);
          res.json({...toReceiptJson(receipt, printer), warnings});
        },
      });
    } catch (error) {
      console.error('❌ Checkout failed:', error);
      const details = error instanceof Error ? error.message : String(error);
      if (error instanceof EffectsError) {
        res.status(502).json({error: 'Checkout data unavailable', details});
        return;
      }
      res.status(500).json({error: 'Failed to check out', details});
    }
  });

  return app;
}
