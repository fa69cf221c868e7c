import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ProductsRepository } from '../../../data-access/repositories/products.repository';
import type { ShopSession } from '../../../common/session/shop-session';
import { WishlistService } from './wishlist.service';
import { InMemoryProductsRepository, product } from '../../../../test/in-memory';

describe('WishlistService', () => {
  let service: WishlistService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        WishlistService,
        {
          provide: ProductsRepository,
          useValue: new InMemoryProductsRepository([product(2), product(9)]),
        },
      ],
    }).compile();
    service = moduleRef.get(WishlistService);
  });

  it('adds each product once', async () => {
    const session: ShopSession = {};
    await service.add(session, 9);
    await service.add(session, 2);
    await service.add(session, 9);
    expect(session.wishlist).toEqual([9, 2]);
  });

  it('removes a product', () => {
    const session: ShopSession = { wishlist: [9, 2] };
    service.remove(session, 9);
    expect(session.wishlist).toEqual([2]);
  });

  it('removes an id whose product was deleted', () => {
    const session: ShopSession = { wishlist: [9, 4] };
    service.remove(session, 4);
    expect(session.wishlist).toEqual([9]);
  });

  it('rejects unknown products', async () => {
    await expect(service.add({}, 3)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('lists products in the order they were added', async () => {
    const products = await service.list({ wishlist: [9, 4, 2] });
    expect(products.map((p) => p.id)).toEqual([9, 2]);
  });
});
