/**
 * TEMPORAL WORKER
 *
 * Registers the placement transaction and the follow-up effects as
 * activities.
 */
import {AppEffects} from '../pure/effects';
import {createActivities} from './placementActivities';
import {ORDER_PLACEMENT_TASK_QUEUE} from './durablePlacement';
import {NativeConnection, Worker} from '@temporalio/worker';

/**
 * Create a worker for the placement workflow
 *
 * @param namespace - Temporal namespace (defaults to 'default')
 * @param taskQueue - Task queue name (defaults to 'order-placement')
 */
export async function createWorker(
  effects: AppEffects,
  namespace = process.env.TEMPORAL_NAMESPACE || 'default',
  taskQueue = ORDER_PLACEMENT_TASK_QUEUE
): Promise<Worker> {
  const connection = await NativeConnection.connect({
    address: process.env.TEMPORAL_ADDRESS || 'localhost:7233',
  });

  return await Worker.create({
    connection,
    namespace,
    taskQueue,
    workflowsPath: require.resolve('./placeOrder.workflow'),
    activities: createActivities(effects),
    maxConcurrentActivityTaskExecutions: 10,
    maxConcurrentWorkflowTaskExecutions: 10,
  });
}

export async function runWorker(effects: AppEffects): Promise<void> {
  const worker = await createWorker(effects);

  console.log('🏃 Temporal worker starting...');
  console.log(`📦 Task queue: ${ORDER_PLACEMENT_TASK_QUEUE}`);
  console.log('🌐 Temporal address:', process.env.TEMPORAL_ADDRESS || 'localhost:7233');

  await worker.run();
}
