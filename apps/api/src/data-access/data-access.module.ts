import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database/database.service';
import { OrdersRepository, ProductsRepository } from './repositories';

@Global()
@Module({
  providers: [DatabaseService, ProductsRepository, OrdersRepository],
  exports: [DatabaseService, ProductsRepository, OrdersRepository],
})
export class DataAccessModule {}
