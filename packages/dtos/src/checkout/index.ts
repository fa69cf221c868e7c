export * from "./requests/checkout.request.dto";
export * from "./responses/order.response.dto";
