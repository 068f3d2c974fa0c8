/**
 * Request parsing for the HTTP API. Bodies are validated with zod and money
 * arrives as decimal currency; everything past this file works in cents.
 */

import {Actor} from '../types';
import {BidSelection, OrderingError, PlaceOrderCommand} from '../pure/types';
import {toCents} from '../pure/money';
import {Either, Left, Right} from 'purify-ts';
import {z, ZodError, ZodType, ZodTypeDef} from 'zod';

const actorHeaders = z.object({
  role: z.enum(['customer', 'chef', 'delivery', 'manager']),
  id: z.string().trim().min(1),
});

// Tolerates the float drift of values like 0.1 + 0.2
const CENT_TOLERANCE = 1e-6;

const amountBody = z.object({
  amount: z.number().finite().positive()
    .refine(amount => Math.abs(toCents(amount) - amount * 100) < CENT_TOLERANCE, {
      message: 'Amount must be a whole number of cents',
    }),
});

const placeOrderBody = z.object({
  customerId: z.string().trim().min(1),
  items: z.array(z.object({
    dishId: z.string().trim().min(1),
    quantity: z.number(),
  })),
  deliveryAddress: z.string().trim().min(1).optional(),
});

const resolutionBody = z.object({
  deliveryPersonId: z.string().trim().min(1),
  justification: z.string().trim().min(1).optional(),
});

export function describeIssues(error: ZodError): string {
  return error.issues
    .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
    .join('; ');
}

function parseWith<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, data: unknown): Either<string, Output> {
  const parsed = schema.safeParse(data);
  return parsed.success ? Right(parsed.data) : Left(describeIssues(parsed.error));
}

export function parseActor(role: string | undefined, id: string | undefined): Either<string, Actor> {
  return parseWith(actorHeaders, {role, id});
}

// Decimal currency in, cents out
export function parseAmount(body: unknown): Either<string, number> {
  return parseWith(amountBody, body).map(({amount}) => toCents(amount));
}

export function parsePlaceOrder(body: unknown): Either<string, PlaceOrderCommand> {
  return parseWith(placeOrderBody, body);
}

export function parseBidSelection(body: unknown): Either<string, BidSelection> {
  return parseWith(resolutionBody, body);
}

export function httpStatusFor(error: OrderingError): number {
  switch (error.kind) {
    case 'InvalidAmount':
    case 'EmptyOrder':
    case 'InvalidQuantity':
    case 'DishUnavailable':
    case 'VipOnlyDish':
      return 400;
    case 'InsufficientFunds':
      return 402;
    case 'NotFound':
      return 404;
    case 'InvalidTransition':
    case 'OrderNotBiddable':
    case 'DuplicateBid':
    case 'NoBids':
    case 'UnknownBid':
    case 'DeliveryPersonInactive':
      return 409;
  }
}
