#!/usr/bin/env node
/**
 * CHECKOUT RUNNER
 *
 * Reads catalog.csv, offers.csv and cart.csv from a data directory, checks
 * the cart out and prints the receipt.
 *
 * Run this with: npm run checkout -- [dataDir]
 */
import {CART_FILE, EffectsFactory, loadConfigFromEnv, readCsvFile} from '../effects/EffectsFactory';
import {AppConfig} from '../effects/types';
import {EMPTY_CART, processCheckout} from '../pure/checkoutProcessing';
import {ReceiptPrinter} from '../pure/receiptPrinter';
import path from 'path';

const RULE = '='.repeat(50);

/**
 * @return the process exit code
 */
export async function runCheckout(args: string[], baseConfig: AppConfig = loadConfigFromEnv()): Promise<number> {
  const dataDir = path.resolve(args[0] ?? baseConfig.sources.dataDir);
  const config: AppConfig = {...baseConfig, sources: {...baseConfig.sources, dataDir}};

  console.log('=== Supermarket Receipt System ===');
  console.log(`Loading catalog, offers, and cart from ${dataDir}...`);

  const effects = await EffectsFactory.make(config);
  try {
    const basketRows = await readCsvFile(path.join(dataDir, CART_FILE));
    const result = await processCheckout(basketRows)(effects);

    return result.caseOf({
      Left: (errors) => {
        errors.forEach(error => console.warn(`Warning: ${error}`));
        return errors[0] === EMPTY_CART ? 0 : 1;
      },
      Right: ({receipt, warnings}) => {
        warnings.forEach(warning => console.warn(`Warning: ${warning}`));
        console.log(`Cart loaded with ${receipt.items.length} items`);
        console.log('\nProcessing checkout...');
        console.log(`\n${RULE}`);
        console.log(new ReceiptPrinter(config.receipt.columns).printReceipt(receipt));
        console.log(RULE);
        return 0;
      },
    });
  } finally {
    await effects.close();
  }
}

if (require.main === module) {
  runCheckout(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('💥 Fatal error:', error);
      process.exitCode = 1;
    });
}
