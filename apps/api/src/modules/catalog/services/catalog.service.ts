import { Injectable, NotFoundException } from '@nestjs/common';
import { ProductsRepository } from '../../../data-access/repositories/products.repository';
import { ProductEntity } from '../../../data-access/entities/product.entity';

export const FEATURED_PRODUCT_LIMIT = 8;

export interface ProductListing {
  products: ProductEntity[];
  categories: string[];
}

@Injectable()
export class CatalogService {
  constructor(private readonly productsRepo: ProductsRepository) {}

  async getFeatured(): Promise<ProductEntity[]> {
    return this.productsRepo.findMany({
      inStockOnly: true,
      newestFirst: true,
      limit: FEATURED_PRODUCT_LIMIT,
    });
  }

  async listProducts(category?: string, search?: string): Promise<ProductListing> {
    const [products, categories] = await Promise.all([
      this.productsRepo.findMany({
        category: category || undefined,
        search: search?.trim() || undefined,
      }),
      this.productsRepo.findCategories(),
    ]);
    return { products, categories };
  }

  async getProduct(productId: number): Promise<ProductEntity> {
    const product = await this.productsRepo.findById(productId);
    if (!product) {
      throw new NotFoundException(`Product ${productId} not found`);
    }
    return product;
  }
}
