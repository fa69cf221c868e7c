import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Session,
} from '@nestjs/common';
import { WishlistService } from '../services/wishlist.service';
import { toProductDtos } from '../../../common/mappers';
import { ParseIdPipe } from '../../../common/pipes/parse-id.pipe';
import { renderPage } from '../../../common/page';
import { routePath } from '../../../common/routes/route-table';
import type { ShopSession } from '../../../common/session/shop-session';

@Controller()
export class WishlistController {
  constructor(private readonly wishlistService: WishlistService) {}

  @Get(routePath('wishlist_view'))
  async wishlistView(@Session() session: ShopSession) {
    return this.renderWishlist(session);
  }

  @Post(routePath('add_to_wishlist'))
  @HttpCode(HttpStatus.OK)
  async addToWishlist(
    @Param('productId', ParseIdPipe) productId: number,
    @Session() session: ShopSession,
  ) {
    await this.wishlistService.add(session, productId);
    return this.renderWishlist(session);
  }

  @Post(routePath('remove_from_wishlist'))
  @HttpCode(HttpStatus.OK)
  async removeFromWishlist(
    @Param('productId', ParseIdPipe) productId: number,
    @Session() session: ShopSession,
  ) {
    this.wishlistService.remove(session, productId);
    return this.renderWishlist(session);
  }

  private async renderWishlist(session: ShopSession) {
    const products = await this.wishlistService.list(session);
    return renderPage('wishlist', {
      products: toProductDtos(products),
    });
  }
}
