import {Bid, DeliveryPerson, Order} from '../domain';
import {placeBid, resolveBids, sortBids} from '../pure/bidding';

const at = new Date('2024-05-01T12:00:00.000Z');

const biddingOrder: Order = {
  id: 'order-1',
  customerId: 'cust-1',
  lines: [{dishId: 'ramen', dishName: 'Shoyu Ramen', quantity: 1, unitPrice: 1250}],
  subtotal: 1250,
  discount: 0,
  finalAmount: 1250,
  status: 'bidding_open',
  deliveryPersonId: null,
  deliveryAddress: '1 Main St',
  createdAt: at,
  history: [{status: 'bidding_open', at}],
};

const driverA: DeliveryPerson = {id: 'driver-a', email: 'a@example.com', isActive: true};
const driverB: DeliveryPerson = {id: 'driver-b', email: 'b@example.com', isActive: true};

const bid = (id: string, deliveryPersonId: string, amount: number, submittedAt = at): Bid => ({
  id,
  orderId: 'order-1',
  deliveryPersonId,
  amount,
  submittedAt,
  state: 'open',
  justification: null,
});

describe('placeBid', () => {
  it('creates an open bid', () => {
    expect(placeBid(biddingOrder, [], driverA, 1000, 'bid-1', at).extract())
      .toEqual(bid('bid-1', 'driver-a', 1000));
  });

  it('accepts one bid per delivery person', () => {
    const existing = [bid('bid-1', 'driver-a', 1000)];

    expect(placeBid(biddingOrder, existing, driverA, 900, 'bid-2', at).extract())
      .toEqual({kind: 'DuplicateBid', orderId: 'order-1', deliveryPersonId: 'driver-a'});
    expect(placeBid(biddingOrder, existing, driverB, 900, 'bid-2', at).isRight()).toBe(true);
  });

  it('refuses bids outside the bidding window', () => {
    const confirmed: Order = {...biddingOrder, status: 'confirmed'};

    expect(placeBid(confirmed, [], driverA, 1000, 'bid-1', at).extract())
      .toEqual({kind: 'OrderNotBiddable', orderId: 'order-1', status: 'confirmed'});
  });

  it('refuses inactive delivery people', () => {
    const retired = {...driverA, isActive: false};

    expect(placeBid(biddingOrder, [], retired, 1000, 'bid-1', at).extract())
      .toEqual({kind: 'DeliveryPersonInactive', deliveryPersonId: 'driver-a'});
  });

  it('refuses non-positive amounts', () => {
    expect(placeBid(biddingOrder, [], driverA, 0, 'bid-1', at).extract())
      .toEqual({kind: 'InvalidAmount', amount: 0});
  });
});

describe('resolveBids', () => {
  const bids = [bid('bid-1', 'driver-a', 1000), bid('bid-2', 'driver-b', 800)];

  it('assigns the order to the selected bid and keeps the others inert', () => {
    const result = resolveBids(biddingOrder, bids, {deliveryPersonId: 'driver-b', justification: 'Closest'}, at);

    expect(result.isRight()).toBe(true);
    result.ifRight(({order, winner, bids: settled}) => {
      expect(order.status).toBe('assigned');
      expect(order.deliveryPersonId).toBe('driver-b');
      expect(winner).toEqual({...bids[1], state: 'selected', justification: 'Closest'});
      expect(settled.map(b => [b.id, b.state])).toEqual([['bid-1', 'inert'], ['bid-2', 'selected']]);
    });
  });

  it('does not have to pick the cheapest bid', () => {
    const result = resolveBids(biddingOrder, bids, {deliveryPersonId: 'driver-a'}, at);

    result.ifRight(({winner}) => {
      expect(winner.amount).toBe(1000);
      expect(winner.justification).toBeNull();
    });
    expect(result.isRight()).toBe(true);
  });

  it('cannot resolve twice', () => {
    const assigned: Order = {...biddingOrder, status: 'assigned', deliveryPersonId: 'driver-b'};

    expect(resolveBids(assigned, bids, {deliveryPersonId: 'driver-a'}, at).extract()).toEqual({
      kind: 'InvalidTransition',
      orderId: 'order-1',
      from: 'assigned',
      to: 'assigned',
    });
  });

  it('needs at least one bid', () => {
    expect(resolveBids(biddingOrder, [], {deliveryPersonId: 'driver-a'}, at).extract())
      .toEqual({kind: 'NoBids', orderId: 'order-1'});
  });

  it('only selects delivery people who bid', () => {
    expect(resolveBids(biddingOrder, bids, {deliveryPersonId: 'driver-z'}, at).extract())
      .toEqual({kind: 'UnknownBid', orderId: 'order-1', deliveryPersonId: 'driver-z'});
  });
});

describe('sortBids', () => {
  it('orders by amount, then by submission time', () => {
    const later = new Date('2024-05-01T12:10:00.000Z');
    const sorted = sortBids([
      bid('bid-1', 'driver-a', 1000),
      bid('bid-2', 'driver-b', 800, later),
      bid('bid-3', 'driver-c', 800),
    ]);

    expect(sorted.map(b => b.id)).toEqual(['bid-3', 'bid-2', 'bid-1']);
  });
});
