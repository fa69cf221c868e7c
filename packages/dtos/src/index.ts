export * as products from "./products";
export * as cart from "./cart";
export * as checkout from "./checkout";
