import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { checkout as checkoutDtos } from '@storefront/dtos';
import { DatabaseService } from '../../../data-access/database/database.service';
import { OrdersRepository } from '../../../data-access/repositories/orders.repository';
import { ProductsRepository } from '../../../data-access/repositories/products.repository';
import { OrderEntity } from '../../../data-access/entities/order.entity';
import { CartService } from '../../cart/services/cart.service';
import type { ShopSession } from '../../../common/session/shop-session';

@Injectable()
export class CheckoutService {
  private readonly logger = new Logger(CheckoutService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly productsRepo: ProductsRepository,
    private readonly ordersRepo: OrdersRepository,
    private readonly cartService: CartService,
  ) {}

  /**
   * Turns the session cart into an order. Stock is taken and the order written
   * in one transaction; the cart is only cleared once that commits.
   */
  async placeOrder(
    session: ShopSession,
    form: checkoutDtos.CheckoutRequestDto,
  ): Promise<OrderEntity> {
    const summary = await this.cartService.summarize(session);
    if (summary.lines.length === 0) {
      throw new BadRequestException('Your cart is empty');
    }

    const order = await this.db.transaction(async (tx) => {
      for (const line of summary.lines) {
        const taken = await this.productsRepo.decrementStock(
          line.product.id,
          line.quantity,
          tx,
        );
        if (!taken) {
          throw new ConflictException(
            `Not enough stock for ${line.product.name}`,
          );
        }
      }

      return this.ordersRepo.createWithItems(
        {
          fullName: form.fullName,
          email: form.email,
          address: form.address,
          city: form.city,
          postalCode: form.postalCode,
          country: form.country,
          totalCents: summary.totalCents,
        },
        summary.lines.map((line) => ({
          productId: line.product.id,
          productName: line.product.name,
          unitPriceCents: line.product.priceCents,
          quantity: line.quantity,
        })),
        tx,
      );
    });

    this.cartService.clear(session);
    this.logger.log(
      `Order ${order.id} placed: ${summary.itemCount} items, ${order.totalCents} cents`,
    );
    return order;
  }

  async getOrder(orderId: number): Promise<OrderEntity> {
    const order = await this.ordersRepo.findById(orderId);
    if (!order) {
      throw new NotFoundException(`Order ${orderId} not found`);
    }
    return order;
  }
}
