export * from './entities/base.entity';
export * from './entities/product.entity';
export * from './entities/order.entity';
export * from './repositories';
export * from './database/database.service';
export * from './data-access.module';
