import {describeRouteFailure, straightLineMeters} from '../pure/geo';

describe('straightLineMeters', () => {
  it('is zero between a point and itself', () => {
    const point = {latitude: 40.758, longitude: -73.9855};

    expect(straightLineMeters(point, point)).toBe(0);
  });

  it('measures one degree of longitude on the equator', () => {
    expect(straightLineMeters({latitude: 0, longitude: 0}, {latitude: 0, longitude: 1})).toBe(111195);
  });
});

describe('describeRouteFailure', () => {
  it('explains an unassigned order', () => {
    expect(describeRouteFailure({reason: 'not_assigned', orderId: 'order-1', straightLineMeters: null}))
      .toBe('Order order-1 has no assigned delivery yet.');
  });

  it('falls back to the delivery address', () => {
    expect(describeRouteFailure({reason: 'address_not_found', orderId: 'order-1', straightLineMeters: null}))
      .toBe('Route information is currently unavailable. Please follow the delivery address.');
  });

  it('adds the straight-line distance when known', () => {
    expect(describeRouteFailure({reason: 'routing_unavailable', orderId: 'order-1', straightLineMeters: 2500}))
      .toBe('Route information is currently unavailable. Please follow the delivery address. ' +
        'Straight-line distance: 2.50 km.');
  });
});
