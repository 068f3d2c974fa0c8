/**
 * Placement through the workflow, with the workflow start replaced by a
 * jest.fn(). No Temporal server involved.
 */

import {WorkflowExecutionAlreadyStartedError} from '@temporalio/client';
import {WorkflowIdReusePolicy} from '@temporalio/common';
import {OrderReceipt} from '../domain';
import {PlacementOutcome} from '../pure/types';
import {DuplicatePlacementError} from '../api/handlers';
import {createDurablePlacement, placementStartOptions, StartPlacement} from '../temporal/durablePlacement';

const command = {customerId: 'cust-1', items: [{dishId: 'tasting', quantity: 1}]};

const receipt: OrderReceipt = {
  orderId: 'order-1',
  customerId: 'cust-1',
  status: 'confirmed',
  subtotal: 6000,
  discount: 0,
  finalAmount: 6000,
  remainingBalance: 4000,
  isVip: false,
  vipUpgraded: false,
};

const finishing = (outcome: PlacementOutcome): StartPlacement =>
  jest.fn().mockResolvedValue({result: () => Promise.resolve(outcome)});

describe('placementStartOptions', () => {
  it('keys the workflow on the request id and refuses to reuse it', () => {
    expect(placementStartOptions(command, 'req-1')).toEqual({
      workflowId: 'place-order-req-1',
      taskQueue: 'order-placement',
      args: [command],
      workflowIdReusePolicy: WorkflowIdReusePolicy.WORKFLOW_ID_REUSE_POLICY_REJECT_DUPLICATE,
    });
  });

  it('takes another task queue and a timeout', () => {
    expect(placementStartOptions(command, 'req-1', {taskQueue: 'orders-eu', workflowExecutionTimeoutMs: 5000}))
      .toEqual(expect.objectContaining({taskQueue: 'orders-eu', workflowExecutionTimeout: 5000}));
  });
});

describe('createDurablePlacement', () => {
  it('answers with the receipt the workflow produced', async () => {
    const start = finishing({ok: true, receipt, customerEmail: 'cust-1@example.com'});

    const result = await createDurablePlacement(start)(command, 'req-1');

    expect(result.extract()).toEqual(receipt);
    expect(start).toHaveBeenCalledWith(expect.objectContaining({workflowId: 'place-order-req-1'}));
  });

  it('answers with the reason the order was refused', async () => {
    const start = finishing({ok: false, error: {kind: 'EmptyOrder'}});

    const result = await createDurablePlacement(start)(command, 'req-1');

    expect(result.extract()).toEqual({kind: 'EmptyOrder'});
  });

  it('reports a request id that was already used', async () => {
    const start: StartPlacement = jest.fn().mockRejectedValue(
      new WorkflowExecutionAlreadyStartedError('Workflow execution already started', 'place-order-req-1', 'placeOrderWorkflow'));

    const placed = createDurablePlacement(start)(command, 'req-1');

    await expect(placed).rejects.toThrow(DuplicatePlacementError);
    await expect(placed).rejects.toThrow('Order request req-1 was already submitted');
  });

  it('lets other start failures through', async () => {
    const start: StartPlacement = jest.fn().mockRejectedValue(new Error('connection refused'));

    await expect(createDurablePlacement(start)(command, 'req-1')).rejects.toThrow('connection refused');
  });
});
