/**
 * Express wiring for the API handlers. The acting user comes from the
 * `x-actor-role` / `x-actor-id` headers set by the authenticating proxy.
 */

import {AppEffects} from '../pure/effects';
import {Actor} from '../types';
import {createHandlers, OrderPlacement} from './handlers';
import {parseActor} from './requests';
import {ApiResponse} from './responses';
import express, {ErrorRequestHandler, NextFunction, Request, Response, Router} from 'express';

type ActorHandler = (actor: Actor, req: Request) => Promise<ApiResponse>;

function send(res: Response, response: ApiResponse): void {
  res.status(response.status).json(response.body);
}

// Express 4 does not catch rejected handler promises
function asActor(handler: ActorHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    parseActor(req.header('x-actor-role'), req.header('x-actor-id')).caseOf({
      Left: message => send(res, {status: 401, body: {error: 'Unauthenticated', message}}),
      Right: actor => {
        handler(actor, req).then(response => send(res, response), next);
      },
    });
  };
}

const handleErrors: ErrorRequestHandler = (error, req, res, _next) => {
  console.error(`❌ ${req.method} ${req.path} failed:`, error);
  res.status(500).json({error: 'InternalError', message: 'Request failed'});
};

export function createApiRouter(
  effects: AppEffects,
  placement: OrderPlacement,
  newRequestId: () => string = () => effects.ids.next()
): Router {
  const handlers = createHandlers(effects, placement);
  const router = Router();

  router.use(express.json());

  router.post('/customers/:customerId/deposits', asActor((actor, req) =>
    handlers.deposit(actor, req.params.customerId, req.body)));

  router.get('/customers/:customerId/ledger', asActor((actor, req) =>
    handlers.ledger(actor, req.params.customerId)));

  router.post('/orders', asActor((actor, req) =>
    handlers.placeOrder(actor, req.body, req.header('x-request-id') || newRequestId())));

  router.post('/orders/:orderId/bidding', asActor((actor, req) =>
    handlers.openBidding(actor, req.params.orderId)));

  router.post('/orders/:orderId/bids', asActor((actor, req) =>
    handlers.submitBid(actor, req.params.orderId, req.body)));

  router.get('/orders/:orderId/bids', asActor((actor, req) =>
    handlers.listBids(actor, req.params.orderId)));

  router.post('/orders/:orderId/resolution', asActor((actor, req) =>
    handlers.resolveBidding(actor, req.params.orderId, req.body)));

  router.get('/delivery/orders', asActor(actor => handlers.biddableOrders(actor)));

  router.get('/delivery/bids', asActor(actor => handlers.ownBids(actor)));

  router.post('/orders/:orderId/completion', asActor((actor, req) =>
    handlers.completeOrder(actor, req.params.orderId)));

  router.get('/orders/:orderId/route', asActor((actor, req) =>
    handlers.viewRoute(actor, req.params.orderId)));

  router.use(handleErrors);

  return router;
}
