import 'express-session';

/** Product id (as a string key) to quantity. */
export type CartMap = Record<string, number>;

declare module 'express-session' {
  interface SessionData {
    cart: CartMap;
    wishlist: number[];
  }
}

/** The slice of the session the shop reads and writes. */
export interface ShopSession {
  cart?: CartMap;
  wishlist?: number[];
}
