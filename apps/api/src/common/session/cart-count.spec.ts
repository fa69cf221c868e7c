import { cartCount } from './cart-count';

describe('cartCount', () => {
  it('is zero without a session', () => {
    expect(cartCount(undefined)).toBe(0);
    expect(cartCount(null)).toBe(0);
  });

  it('is zero when the session has no cart', () => {
    expect(cartCount({})).toBe(0);
    expect(cartCount({ wishlist: [3] })).toBe(0);
  });

  it('is zero for an empty cart', () => {
    expect(cartCount({ cart: {} })).toBe(0);
  });

  it('sums the quantities', () => {
    expect(cartCount({ cart: { '1': 2, '5': 3 } })).toBe(5);
  });

  it('ignores quantities that are not numbers', () => {
    expect(cartCount({ cart: { '1': 2, '2': Number.NaN } })).toBe(2);
  });
});
