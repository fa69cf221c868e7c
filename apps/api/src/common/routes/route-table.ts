/**
 * URL patterns of every page the shop serves, keyed by route name.
 * `<param>` segments only ever match digits.
 */
export const ROUTES = {
  home: '/',
  product_list: '/products/',
  product_detail: '/product/<product_id>/',
  cart_view: '/cart/',
  add_to_cart: '/add-to-cart/<product_id>/',
  remove_from_cart: '/remove-from-cart/<product_id>/',
  clear_cart: '/clear-cart/',
  wishlist_view: '/wishlist/',
  add_to_wishlist: '/add-to-wishlist/<product_id>/',
  remove_from_wishlist: '/remove-from-wishlist/<product_id>/',
  checkout: '/checkout/',
  thank_you: '/thank-you/<order_id>/',
} as const;

export type RouteName = keyof typeof ROUTES;

const PARAM_PATTERN = /<([a-z_]+)>/g;

function camelCase(name: string): string {
  return name.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Express path for a route: `<product_id>` becomes `:productId(\d+)` and the
 * trailing slash is dropped, since non-strict routing already accepts it.
 */
export function routePath(name: RouteName): string {
  const path = ROUTES[name].replace(
    PARAM_PATTERN,
    (_, param: string) => `:${camelCase(param)}(\\d+)`,
  );
  return path.length > 1 ? path.replace(/\/$/, '') : path;
}

export function reverse(
  name: RouteName,
  params: Record<string, number> = {},
): string {
  return ROUTES[name].replace(PARAM_PATTERN, (_, param: string) => {
    const value = params[param];
    if (value === undefined) {
      throw new Error(`Missing parameter "${param}" for route "${name}"`);
    }
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(
        `Parameter "${param}" for route "${name}" must be a non-negative integer`,
      );
    }
    return String(value);
  });
}
