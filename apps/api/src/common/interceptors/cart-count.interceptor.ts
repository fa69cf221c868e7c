import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { cartCount } from '../session/cart-count';
import { isPagePayload } from '../page';

/**
 * Adds `cart_count` to every page payload. Runs after the handler, so a page
 * returned by add-to-cart already shows the new count.
 */
@Injectable()
export class CartCountInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }
    const request = context.switchToHttp().getRequest<Request>();

    return next.handle().pipe(
      map((body: unknown) =>
        isPagePayload(body)
          ? { ...body, cart_count: cartCount(request.session) }
          : body,
      ),
    );
  }
}
