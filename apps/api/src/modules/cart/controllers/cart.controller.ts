import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Session,
} from '@nestjs/common';
import { cart as cartDtos } from '@storefront/dtos';
import { CartService } from '../services/cart.service';
import { toCartLineDtos } from '../../../common/mappers';
import { ParseIdPipe } from '../../../common/pipes/parse-id.pipe';
import { renderPage } from '../../../common/page';
import { routePath } from '../../../common/routes/route-table';
import type { ShopSession } from '../../../common/session/shop-session';

@Controller()
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get(routePath('cart_view'))
  async cartView(@Session() session: ShopSession) {
    return this.renderCart(session);
  }

  @Post(routePath('add_to_cart'))
  @HttpCode(HttpStatus.OK)
  async addToCart(
    @Param('productId', ParseIdPipe) productId: number,
    @Body() body: cartDtos.AddToCartRequestDto,
    @Session() session: ShopSession,
  ) {
    await this.cartService.add(session, productId, body.quantity ?? 1);
    return this.renderCart(session);
  }

  @Post(routePath('remove_from_cart'))
  @HttpCode(HttpStatus.OK)
  async removeFromCart(
    @Param('productId', ParseIdPipe) productId: number,
    @Session() session: ShopSession,
  ) {
    this.cartService.remove(session, productId);
    return this.renderCart(session);
  }

  @Post(routePath('clear_cart'))
  @HttpCode(HttpStatus.OK)
  async clearCart(@Session() session: ShopSession) {
    this.cartService.clear(session);
    return this.renderCart(session);
  }

  private async renderCart(session: ShopSession) {
    const summary = await this.cartService.summarize(session);
    return renderPage('cart', {
      lines: toCartLineDtos(summary.lines),
      itemCount: summary.itemCount,
      totalCents: summary.totalCents,
    });
  }
}
