import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { AppConfigModule } from './config/app-config.module';
import { DataAccessModule } from './data-access';
import { CartCountInterceptor } from './common/interceptors/cart-count.interceptor';
import { CatalogModule } from './modules/catalog/catalog.module';
import { CartModule } from './modules/cart/cart.module';
import { WishlistModule } from './modules/wishlist/wishlist.module';
import { CheckoutModule } from './modules/checkout/checkout.module';

@Module({
  imports: [
    AppConfigModule,
    DataAccessModule,
    CatalogModule,
    CartModule,
    WishlistModule,
    CheckoutModule,
  ],
  providers: [{ provide: APP_INTERCEPTOR, useClass: CartCountInterceptor }],
})
export class AppModule {}
