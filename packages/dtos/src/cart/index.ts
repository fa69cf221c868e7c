export * from "./requests/add-to-cart.request.dto";
export * from "./responses/cart-line.response.dto";
