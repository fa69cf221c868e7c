import type { ShopSession } from './shop-session';

/** Total number of items in the session cart; 0 when there is no cart. */
export function cartCount(session?: ShopSession | null): number {
  const cart = session?.cart ?? {};
  return Object.values(cart).reduce(
    (sum, quantity) => (Number.isFinite(quantity) ? sum + quantity : sum),
    0,
  );
}
