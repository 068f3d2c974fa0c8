/**
 * DURABLE PLACEMENT
 *
 * Order placement through the workflow. The request id becomes the workflow
 * id and Temporal refuses to reuse it, even after the first run has closed,
 * so a retried request cannot charge the customer twice.
 */

import {WorkflowExecutionAlreadyStartedError, WorkflowStartOptions} from '@temporalio/client';
import {WorkflowIdReusePolicy} from '@temporalio/common';
import {PlaceOrderCommand, PlacementOutcome} from '../pure/types';
import {fromPlacementOutcome} from '../pure/businessLogic';
import {DuplicatePlacementError, OrderPlacement} from '../api/handlers';
import type {placeOrderWorkflow} from './placeOrder.workflow';

export const ORDER_PLACEMENT_TASK_QUEUE = 'order-placement';

export type PlacementStartOptions = WorkflowStartOptions<typeof placeOrderWorkflow>;

// The part of a workflow handle placement waits on
export interface PlacementRun {
  result(): Promise<PlacementOutcome>;
}

export type StartPlacement = (options: PlacementStartOptions) => Promise<PlacementRun>;

export function placementWorkflowId(requestId: string): string {
  return `place-order-${requestId}`;
}

export function placementStartOptions(
  command: PlaceOrderCommand,
  requestId: string,
  options?: {
    workflowExecutionTimeoutMs?: number;
    taskQueue?: string;
  }
): PlacementStartOptions {
  return {
    workflowId: placementWorkflowId(requestId),
    taskQueue: options?.taskQueue || ORDER_PLACEMENT_TASK_QUEUE,
    args: [command],
    workflowIdReusePolicy: WorkflowIdReusePolicy.WORKFLOW_ID_REUSE_POLICY_REJECT_DUPLICATE,
    workflowExecutionTimeout: options?.workflowExecutionTimeoutMs,
  };
}

/**
 * Place orders by starting a workflow and waiting for its outcome. A start
 * refused because the id was already used surfaces as DuplicatePlacementError.
 */
export function createDurablePlacement(start: StartPlacement): OrderPlacement {
  return async (command, requestId) => {
    let run: PlacementRun;
    try {
      run = await start(placementStartOptions(command, requestId));
    } catch (error) {
      if (error instanceof WorkflowExecutionAlreadyStartedError) throw new DuplicatePlacementError(requestId);
      throw error;
    }
    return fromPlacementOutcome(await run.result());
  };
}
