import { Injectable, NotFoundException } from '@nestjs/common';
import { ProductsRepository } from '../../../data-access/repositories/products.repository';
import { ProductEntity } from '../../../data-access/entities/product.entity';
import type { ShopSession } from '../../../common/session/shop-session';

@Injectable()
export class WishlistService {
  constructor(private readonly productsRepo: ProductsRepository) {}

  async add(session: ShopSession, productId: number): Promise<void> {
    await this.requireProduct(productId);
    const wishlist = session.wishlist ?? [];
    if (!wishlist.includes(productId)) {
      session.wishlist = [...wishlist, productId];
    }
  }

  remove(session: ShopSession, productId: number): void {
    session.wishlist = (session.wishlist ?? []).filter((id) => id !== productId);
  }

  /** Wishlist products in the order they were added. */
  async list(session: ShopSession): Promise<ProductEntity[]> {
    const ids = session.wishlist ?? [];
    const products = await this.productsRepo.findByIds(ids);
    const byId = new Map(products.map((p) => [p.id, p]));
    return ids.flatMap((id) => {
      const product = byId.get(id);
      return product ? [product] : [];
    });
  }

  private async requireProduct(productId: number): Promise<void> {
    const product = await this.productsRepo.findById(productId);
    if (!product) {
      throw new NotFoundException(`Product ${productId} not found`);
    }
  }
}
