import { Injectable, NotFoundException, PipeTransform } from '@nestjs/common';

/** Largest value a Postgres `integer` (serial) column holds. */
export const MAX_ROW_ID = 2147483647;

/**
 * Turns a `<product_id>` / `<order_id>` segment into a row id. Ids no row can
 * have are a 404, the same as an id with no row.
 */
@Injectable()
export class ParseIdPipe implements PipeTransform<string | number, number> {
  transform(value: string | number): number {
    const raw = String(value);
    const id = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(id) || id < 1 || id > MAX_ROW_ID) {
      throw new NotFoundException(`No such id: ${raw}`);
    }
    return id;
  }
}
