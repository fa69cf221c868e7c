import {
  Body,
  Controller,
  Get,
  Param,
  Post,
  Session,
} from '@nestjs/common';
import { checkout as checkoutDtos } from '@storefront/dtos';
import { CheckoutService } from '../services/checkout.service';
import { CartService } from '../../cart/services/cart.service';
import { toCartLineDtos, toOrderDto } from '../../../common/mappers';
import { ParseIdPipe } from '../../../common/pipes/parse-id.pipe';
import { renderPage } from '../../../common/page';
import { reverse, routePath } from '../../../common/routes/route-table';
import type { ShopSession } from '../../../common/session/shop-session';

const CHECKOUT_FIELDS = [
  'fullName',
  'email',
  'address',
  'city',
  'postalCode',
  'country',
] as const;

@Controller()
export class CheckoutController {
  constructor(
    private readonly checkoutService: CheckoutService,
    private readonly cartService: CartService,
  ) {}

  @Get(routePath('checkout'))
  async checkoutForm(@Session() session: ShopSession) {
    const summary = await this.cartService.summarize(session);
    return renderPage('checkout', {
      lines: toCartLineDtos(summary.lines),
      totalCents: summary.totalCents,
      fields: CHECKOUT_FIELDS,
    });
  }

  @Post(routePath('checkout'))
  async placeOrder(
    @Body() form: checkoutDtos.CheckoutRequestDto,
    @Session() session: ShopSession,
  ) {
    const order = await this.checkoutService.placeOrder(session, form);
    return renderPage('checkout_complete', {
      orderId: order.id,
      redirectTo: reverse('thank_you', { order_id: order.id }),
    });
  }

  @Get(routePath('thank_you'))
  async thankYou(@Param('orderId', ParseIdPipe) orderId: number) {
    const order = await this.checkoutService.getOrder(orderId);
    return renderPage('thank_you', {
      order: toOrderDto(order),
    });
  }
}
