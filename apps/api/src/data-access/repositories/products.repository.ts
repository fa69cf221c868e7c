import { Injectable } from '@nestjs/common';
import { DatabaseService, TransactionClient } from '../database/database.service';
import { ProductEntity } from '../entities/product.entity';

interface ProductRow {
  id: number;
  name: string;
  description: string;
  category: string;
  price_cents: number;
  stock: number;
  image_url: string | null;
  created_at: Date;
}

export interface ProductFilter {
  category?: string;
  search?: string;
  inStockOnly?: boolean;
  newestFirst?: boolean;
  limit?: number;
}

const COLUMNS =
  'id, name, description, category, price_cents, stock, image_url, created_at';

function toEntity(row: ProductRow): ProductEntity {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    category: row.category,
    priceCents: row.price_cents,
    stock: row.stock,
    imageUrl: row.image_url,
    createdAt: row.created_at,
  };
}

@Injectable()
export class ProductsRepository {
  constructor(private readonly db: DatabaseService) {}

  async findById(id: number, tx?: TransactionClient): Promise<ProductEntity | null> {
    const rows = await this.db.query<ProductRow>(
      `SELECT ${COLUMNS} FROM products WHERE id = $1`,
      [id],
      tx,
    );
    return rows[0] ? toEntity(rows[0]) : null;
  }

  async findByIds(ids: number[], tx?: TransactionClient): Promise<ProductEntity[]> {
    if (ids.length === 0) {
      return [];
    }
    const rows = await this.db.query<ProductRow>(
      `SELECT ${COLUMNS} FROM products WHERE id = ANY($1::int[])`,
      [ids],
      tx,
    );
    return rows.map(toEntity);
  }

  async findMany(filter: ProductFilter = {}): Promise<ProductEntity[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.category) {
      values.push(filter.category);
      conditions.push(`category = $${values.length}`);
    }
    if (filter.search) {
      values.push(`%${filter.search}%`);
      conditions.push(
        `(name ILIKE $${values.length} OR description ILIKE $${values.length})`,
      );
    }
    if (filter.inStockOnly) {
      conditions.push('stock > 0');
    }

    let sql = `SELECT ${COLUMNS} FROM products`;
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(' AND ')}`;
    }
    sql += filter.newestFirst
      ? ' ORDER BY created_at DESC, id DESC'
      : ' ORDER BY name ASC, id ASC';
    if (filter.limit !== undefined) {
      values.push(filter.limit);
      sql += ` LIMIT $${values.length}`;
    }

    const rows = await this.db.query<ProductRow>(sql, values);
    return rows.map(toEntity);
  }

  async findCategories(): Promise<string[]> {
    const rows = await this.db.query<{ category: string }>(
      'SELECT DISTINCT category FROM products ORDER BY category',
    );
    return rows.map((row) => row.category);
  }

  /** Takes `quantity` units out of stock; false when not enough are left. */
  async decrementStock(
    id: number,
    quantity: number,
    tx?: TransactionClient,
  ): Promise<boolean> {
    const rows = await this.db.query<{ id: number }>(
      'UPDATE products SET stock = stock - $2 WHERE id = $1 AND stock >= $2 RETURNING id',
      [id, quantity],
      tx,
    );
    return rows.length > 0;
  }
}
