import { Controller, Get, Param, Query, Session } from '@nestjs/common';
import { products as productDtos } from '@storefront/dtos';
import { CatalogService } from '../services/catalog.service';
import { toProductDto, toProductDtos } from '../../../common/mappers';
import { ParseIdPipe } from '../../../common/pipes/parse-id.pipe';
import { renderPage } from '../../../common/page';
import { routePath } from '../../../common/routes/route-table';
import type { ShopSession } from '../../../common/session/shop-session';

@Controller()
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  @Get(routePath('home'))
  async home() {
    const featured = await this.catalogService.getFeatured();
    return renderPage('home', {
      featured: toProductDtos(featured),
    });
  }

  @Get(routePath('product_list'))
  async productList(@Query() query: productDtos.ProductListQueryDto) {
    const { products, categories } = await this.catalogService.listProducts(
      query.category,
      query.q,
    );
    return renderPage('product_list', {
      products: toProductDtos(products),
      categories,
      selectedCategory: query.category ?? null,
      query: query.q ?? '',
    });
  }

  @Get(routePath('product_detail'))
  async productDetail(
    @Param('productId', ParseIdPipe) productId: number,
    @Session() session: ShopSession,
  ) {
    const product = await this.catalogService.getProduct(productId);
    return renderPage('product_detail', {
      product: toProductDto(product),
      inWishlist: (session.wishlist ?? []).includes(productId),
    });
  }
}
