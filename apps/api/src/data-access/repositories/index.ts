export * from './products.repository';
export * from './orders.repository';
