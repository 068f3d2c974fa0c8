import {formatMoney, isWholeCents, scaleHalfUp, toCents, toCurrency} from '../pure/money';

describe('money', () => {
  it('converts decimal currency to cents without float drift', () => {
    expect(toCents(0.1 + 0.2)).toBe(30);
    expect(toCents(57)).toBe(5700);
    expect(toCurrency(4300)).toBe(43);
  });

  it('formats cents as dollars', () => {
    expect(formatMoney(5700)).toBe('$57.00');
    expect(formatMoney(5)).toBe('$0.05');
  });

  it('only accepts integral cents', () => {
    expect(isWholeCents(100)).toBe(true);
    expect(isWholeCents(0.5)).toBe(false);
    expect(isWholeCents(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('rounds half up when scaling', () => {
    expect(scaleHalfUp(6000, 95, 100)).toBe(5700);
    expect(scaleHalfUp(110, 95, 100)).toBe(105);
    expect(scaleHalfUp(109, 95, 100)).toBe(104);
  });
});
