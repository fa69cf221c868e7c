export * from "./requests/product-list.query.dto";
export * from "./responses/product.response.dto";
