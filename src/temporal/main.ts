/**
 * SERVICE STARTUP SCRIPT
 *
 * Starts:
 * 1. The HTTP API for customers, chefs, delivery people and managers
 * 2. A Temporal worker that executes durable order placements
 *
 * Run this with: npm start
 */
import {makeAppEffects} from '../effects/EffectsFactory';
import {AppEffects} from '../pure/effects';
import {createApiRouter} from '../api/router';
import {runWorker} from './worker';
import {durablePlacement} from './client';
import {ORDER_PLACEMENT_TASK_QUEUE} from './durablePlacement';
import express from 'express';

async function main() {
  console.log('🚀 Starting ordering API and Temporal worker...\n');

  try {
    const appEffects = await makeAppEffects();

    console.log('📋 Configuration:');
    console.log('   - Temporal Server:', process.env.TEMPORAL_ADDRESS || 'localhost:7233');
    console.log('   - Namespace:', process.env.TEMPORAL_NAMESPACE || 'default');
    console.log(`   - Task Queue: ${ORDER_PLACEMENT_TASK_QUEUE}`);
    console.log('   - Workflows: placeOrderWorkflow');
    console.log('');

    await startApiServer(appEffects);

    // Runs until the process is stopped
    await runWorker(appEffects);

  } catch (error) {
    console.error('❌ Failed to start service:', error);
    process.exit(1);
  }
}

async function startApiServer(appEffects: AppEffects): Promise<void> {
  const app = express();
  const port = parseInt(process.env.API_PORT || '3000', 10);

  app.get('/health', (req, res) => {
    res.json({status: 'healthy', service: 'restaurant-ordering'});
  });

  app.use('/api', createApiRouter(appEffects, durablePlacement));

  return new Promise((resolve) => {
    app.listen(port, () => {
      console.log(`🌐 API server started on port ${port}`);
      console.log(`   - Place order: POST http://localhost:${port}/api/orders`);
      console.log(`   - Delivery route: GET http://localhost:${port}/api/orders/:orderId/route`);
      console.log(`   - Health check: GET http://localhost:${port}/health`);
      console.log('');
      resolve();
    });
  });
}

process.on('SIGINT', () => {
  console.log('\n⏸️  Received SIGINT, shutting down gracefully...');
  console.log('   (In-progress workflows will complete)');
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.log('\n⏸️  Received SIGTERM, shutting down gracefully...');
  process.exit(0);
});

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
