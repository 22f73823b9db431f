/**
 * Orders sample - in-memory repository.
 */

import { v4 as uuidv4 } from 'uuid';
import { OperationCancelledError } from '../../src';
import type { IOrderRepository, NewOrder, OrderDto } from './orders';

export class InMemoryOrderRepository implements IOrderRepository {
  private readonly orders = new Map<string, OrderDto>();

  /** When set, `create` reports failure instead of storing. */
  rejectWrites = false;

  /** Number of calls made to any method. */
  calls = 0;

  constructor(private readonly idFactory: () => string = uuidv4) {}

  async create(order: NewOrder, signal?: AbortSignal): Promise<string | null> {
    this.track(signal);
    if (this.rejectWrites) {
      return null;
    }

    const id = this.idFactory();
    this.orders.set(id, {
      id,
      customerId: order.customerId,
      items: order.items,
      total: order.items.reduce((sum, item) => sum + item.quantity * item.unitPrice, 0),
      createdAt: new Date(),
    });
    return id;
  }

  async findById(id: string, signal?: AbortSignal): Promise<OrderDto | null> {
    this.track(signal);
    return this.orders.get(id) ?? null;
  }

  async findByCustomer(
    customerId: string,
    skip: number,
    take: number,
    signal?: AbortSignal,
  ): Promise<[OrderDto[], number]> {
    this.track(signal);
    const matching = [...this.orders.values()].filter((o) => o.customerId === customerId);
    return [matching.slice(skip, skip + take), matching.length];
  }

  private track(signal?: AbortSignal): void {
    this.calls += 1;
    if (signal?.aborted) {
      throw new OperationCancelledError('Repository call was cancelled', signal.reason);
    }
  }
}
