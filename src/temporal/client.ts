/**
 * TEMPORAL CLIENT
 *
 * Starts placement workflows from the API. The worker executes them.
 */

import {Client, Connection} from '@temporalio/client';
import {OrderPlacement} from '../api/handlers';
import {placeOrderWorkflow} from './placeOrder.workflow';
import {createDurablePlacement, PlacementStartOptions} from './durablePlacement';

let client: Client | null = null;

/**
 * Get or create a Temporal client. The client is lightweight and reused
 * across requests.
 */
export async function getTemporalClient(): Promise<Client> {
  if (!client) {
    const connection = await Connection.connect({
      address: process.env.TEMPORAL_ADDRESS || 'localhost:7233',
    });

    client = new Client({
      connection,
      namespace: process.env.TEMPORAL_NAMESPACE || 'default',
    });
  }

  return client;
}

/**
 * Start a durable placement workflow
 */
export async function startOrderPlacement(options: PlacementStartOptions) {
  const temporalClient = await getTemporalClient();
  return await temporalClient.workflow.start(placeOrderWorkflow, options);
}

// Placement for the API: waits for the workflow and answers with its outcome
export const durablePlacement: OrderPlacement = createDurablePlacement(startOrderPlacement);
