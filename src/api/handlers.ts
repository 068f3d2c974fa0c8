/**
 * API handlers: capability checks, body parsing and the mapping of core
 * results onto status codes. Transport-free so they run without a server.
 */

import {Order, OrderReceipt} from '../domain';
import {Actor} from '../types';
import {AppEffects} from '../pure/effects';
import {OrderingError, PlaceOrderCommand} from '../pure/types';
import {actsForCustomer, can, canAccessOrder, Capability} from '../pure/capabilities';
import {depositFunds, ledgerHistory} from '../pure/accountLedger';
import {completeOrder, openBiddingForOrder} from '../pure/orderProcessing';
import {listBiddableOrders, listBids, listOwnBids, resolveBidding, submitBid} from '../pure/biddingCoordinator';
import {planDeliveryRoute} from '../pure/routePlanning';
import {toCurrency} from '../pure/money';
import {httpStatusFor, parseAmount, parseBidSelection, parsePlaceOrder} from './requests';
import {
  ApiResponse,
  errorResponse,
  ok,
  orderingErrorBody,
  presentBid,
  presentLedgerEntry,
  presentOrder,
  presentReceipt,
  presentRoute,
  presentRouteFailure,
} from './responses';
import {Either} from 'purify-ts';

/**
 * Thrown by an OrderPlacement when the same request was already placed.
 */
export class DuplicatePlacementError extends Error {
  constructor(readonly requestId: string) {
    super(`Order request ${requestId} was already submitted`);
    this.name = 'DuplicatePlacementError';
  }
}

/**
 * How placement runs: directly against the effects, or through the durable
 * workflow. `requestId` identifies the request for deduplication.
 */
export type OrderPlacement = (
  command: PlaceOrderCommand,
  requestId: string
) => Promise<Either<OrderingError, OrderReceipt>>;

const forbidden = (capability: Capability): ApiResponse =>
  errorResponse(403, 'Forbidden', `Not allowed: ${capability}`);

const invalidRequest = (message: string): ApiResponse => errorResponse(400, 'InvalidRequest', message);

function respond<T>(result: Either<OrderingError, T>, present: (value: T) => unknown, status = 200): ApiResponse {
  return result.caseOf<ApiResponse>({
    Left: error => ({status: httpStatusFor(error), body: orderingErrorBody(error)}),
    Right: value => ok(present(value), status),
  });
}

function withBody<T>(
  parsed: Either<string, T>,
  handle: (value: T) => Promise<ApiResponse>
): Promise<ApiResponse> {
  return parsed.caseOf<Promise<ApiResponse>>({
    Left: message => Promise.resolve(invalidRequest(message)),
    Right: handle,
  });
}

export function createHandlers(effects: AppEffects, placement: OrderPlacement) {
  // Role check first, then the order-level check, which needs the order
  async function withOrderAccess(
    actor: Actor,
    orderId: string,
    capability: Capability,
    handle: (order: Order) => Promise<ApiResponse>
  ): Promise<ApiResponse> {
    if (!can(actor, capability)) return forbidden(capability);
    const order = await effects.orders.getById(orderId);
    if (!order) return errorResponse(404, 'NotFound', `Order ${orderId} not found`);
    if (!canAccessOrder(actor, order)) return forbidden(capability);
    return handle(order);
  }

  return {
    async deposit(actor: Actor, customerId: string, body: unknown): Promise<ApiResponse> {
      if (!can(actor, 'deposit') || !actsForCustomer(actor, customerId)) return forbidden('deposit');
      return withBody(parseAmount(body), async amount =>
        respond(await depositFunds(customerId, amount)(effects), ({customer, entry}) => ({
          customerId: customer.id,
          balance: toCurrency(customer.balance),
          entry: presentLedgerEntry(entry),
        })));
    },

    async ledger(actor: Actor, customerId: string): Promise<ApiResponse> {
      if (!can(actor, 'view_ledger') || !actsForCustomer(actor, customerId)) return forbidden('view_ledger');
      return respond(await ledgerHistory(customerId)(effects), entries => entries.map(presentLedgerEntry));
    },

    async placeOrder(actor: Actor, body: unknown, requestId: string): Promise<ApiResponse> {
      if (!can(actor, 'place_order')) return forbidden('place_order');
      return withBody(parsePlaceOrder(body), async command => {
        if (!actsForCustomer(actor, command.customerId)) return forbidden('place_order');
        try {
          return respond(await placement(command, requestId), presentReceipt, 201);
        } catch (error) {
          if (error instanceof DuplicatePlacementError) return errorResponse(409, 'DuplicateRequest', error.message);
          throw error;
        }
      });
    },

    async openBidding(actor: Actor, orderId: string): Promise<ApiResponse> {
      if (!can(actor, 'open_bidding')) return forbidden('open_bidding');
      return respond(await openBiddingForOrder(orderId)(effects), presentOrder);
    },

    async submitBid(actor: Actor, orderId: string, body: unknown): Promise<ApiResponse> {
      if (!can(actor, 'submit_bid')) return forbidden('submit_bid');
      return withBody(parseAmount(body), async amount =>
        respond(await submitBid(orderId, actor.id, amount)(effects), presentBid, 201));
    },

    async resolveBidding(actor: Actor, orderId: string, body: unknown): Promise<ApiResponse> {
      if (!can(actor, 'resolve_bidding')) return forbidden('resolve_bidding');
      return withBody(parseBidSelection(body), async selection =>
        respond(await resolveBidding(orderId, selection)(effects), ({order, winner}) => ({
          order: presentOrder(order),
          winner: presentBid(winner),
        })));
    },

    async listBids(actor: Actor, orderId: string): Promise<ApiResponse> {
      if (!can(actor, 'view_bids')) return forbidden('view_bids');
      return respond(await listBids(orderId)(effects), bids => bids.map(presentBid));
    },

    async biddableOrders(actor: Actor): Promise<ApiResponse> {
      if (!can(actor, 'browse_bidding')) return forbidden('browse_bidding');
      return ok((await listBiddableOrders()(effects)).map(presentOrder));
    },

    async ownBids(actor: Actor): Promise<ApiResponse> {
      if (!can(actor, 'view_own_bids')) return forbidden('view_own_bids');
      return respond(await listOwnBids(actor.id)(effects), bids => bids.map(presentBid));
    },

    completeOrder(actor: Actor, orderId: string): Promise<ApiResponse> {
      return withOrderAccess(actor, orderId, 'complete_order', async () =>
        respond(await completeOrder(orderId)(effects), presentOrder));
    },

    viewRoute(actor: Actor, orderId: string): Promise<ApiResponse> {
      return withOrderAccess(actor, orderId, 'view_route', async order => {
        const route = await planDeliveryRoute(order)(effects);
        const {address} = effects.restaurant;
        return ok(route.caseOf<unknown>({
          Left: failure => presentRouteFailure(failure, address),
          Right: found => presentRoute(found, address),
        }));
      });
    },
  };
}
