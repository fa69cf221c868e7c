import { Injectable, NotFoundException } from '@nestjs/common';
import { ProductsRepository } from '../../../data-access/repositories/products.repository';
import { ProductEntity } from '../../../data-access/entities/product.entity';
import type { ShopSession } from '../../../common/session/shop-session';

export interface CartLine {
  product: ProductEntity;
  quantity: number;
  lineTotalCents: number;
}

export interface CartSummary {
  lines: CartLine[];
  itemCount: number;
  totalCents: number;
}

@Injectable()
export class CartService {
  constructor(private readonly productsRepo: ProductsRepository) {}

  async add(
    session: ShopSession,
    productId: number,
    quantity = 1,
  ): Promise<void> {
    await this.requireProduct(productId);
    const cart = { ...(session.cart ?? {}) };
    const key = String(productId);
    cart[key] = (cart[key] ?? 0) + quantity;
    session.cart = cart;
  }

  /** Drops the key even when its product no longer exists. */
  remove(session: ShopSession, productId: number): void {
    if (!session.cart) {
      return;
    }
    const cart = { ...session.cart };
    delete cart[String(productId)];
    session.cart = cart;
  }

  clear(session: ShopSession): void {
    session.cart = {};
  }

  /** Cart lines by product id; ids whose product is gone are skipped. */
  async summarize(session: ShopSession): Promise<CartSummary> {
    const entries = Object.entries(session.cart ?? {});
    const products = await this.productsRepo.findByIds(
      entries.map(([id]) => Number(id)),
    );
    const byId = new Map(products.map((p) => [p.id, p]));

    const lines: CartLine[] = [];
    for (const [id, quantity] of entries) {
      const product = byId.get(Number(id));
      if (!product) {
        continue;
      }
      lines.push({
        product,
        quantity,
        lineTotalCents: product.priceCents * quantity,
      });
    }

    return {
      lines,
      itemCount: lines.reduce((sum, line) => sum + line.quantity, 0),
      totalCents: lines.reduce((sum, line) => sum + line.lineTotalCents, 0),
    };
  }

  private async requireProduct(productId: number): Promise<ProductEntity> {
    const product = await this.productsRepo.findById(productId);
    if (!product) {
      throw new NotFoundException(`Product ${productId} not found`);
    }
    return product;
  }
}
