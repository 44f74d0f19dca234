/**
 * API SERVER STARTUP SCRIPT
 *
 * Run this with: npm start
 */
import {loadConfigFromEnv, makeAppEffects} from '../effects/EffectsFactory';
import {ReceiptPrinter} from '../pure/receiptPrinter';
import {createApp} from './app';

async function main() {
  console.log('🚀 Starting checkout API server...\n');

  const config = loadConfigFromEnv();
  const appEffects = await makeAppEffects(config);

  console.log('📋 Configuration:');
  console.log('   - Catalog source:', config.sources.catalog);
  console.log('   - Offer source:', config.sources.offers);
  console.log('   - Data directory:', config.sources.dataDir);
  console.log('');

  const app = createApp(appEffects, new ReceiptPrinter(config.receipt.columns));
  const server = app.listen(config.api.port, () => {
    console.log(`🌐 API server started on port ${config.api.port}`);
    console.log(`   - Check out: POST http://localhost:${config.api.port}/api/checkout`);
    console.log(`   - Health check: GET http://localhost:${config.api.port}/health`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n⏸️  Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      appEffects.close()
        .catch((error) => console.error('❌ Failed to close effects:', error))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
