/**
 * Orders sample - requests, DTOs and repository port.
 */

import { NIL } from 'uuid';
import { z } from 'zod';
import { CommandBase, PagedQueryBase, QueryBase, ZodValidator } from '../../src';

export interface OrderItem {
  readonly productId: string;
  readonly quantity: number;
  readonly unitPrice: number;
}

export interface OrderDto {
  readonly id: string;
  readonly customerId: string;
  readonly items: readonly OrderItem[];
  readonly total: number;
  readonly createdAt: Date;
}

export interface NewOrder {
  readonly customerId: string;
  readonly items: readonly OrderItem[];
}

/**
 * Persistence port for orders.
 */
export interface IOrderRepository {
  /** Returns the new order's ID, or null if the order could not be stored. */
  create(order: NewOrder, signal?: AbortSignal): Promise<string | null>;
  findById(id: string, signal?: AbortSignal): Promise<OrderDto | null>;
  /** Returns one page of a customer's orders and the customer's total order count. */
  findByCustomer(
    customerId: string,
    skip: number,
    take: number,
    signal?: AbortSignal,
  ): Promise<[OrderDto[], number]>;
}

// ==================== Requests ====================

export class CreateOrderCommand extends CommandBase<string> {
  constructor(
    readonly customerId: string,
    readonly items: readonly OrderItem[],
  ) {
    super();
  }
}

export class GetOrderByIdQuery extends QueryBase<OrderDto> {
  constructor(readonly orderId: string) {
    super();
  }
}

export class ListCustomerOrdersQuery extends PagedQueryBase<OrderDto> {
  constructor(
    readonly customerId: string,
    pageNumber?: number,
    pageSize?: number,
  ) {
    super(pageNumber, pageSize);
  }
}

// ==================== Validators ====================

const CustomerIdSchema = z
  .string()
  .refine((id) => id.length > 0 && id !== NIL, 'Customer ID cannot be empty.');

const OrderItemSchema = z.object({
  productId: z.string().min(1, 'Product ID is required.'),
  quantity: z.number().int().positive('Quantity must be greater than zero.'),
  unitPrice: z.number().nonnegative('Unit price cannot be negative.'),
});

export const createOrderValidator = new ZodValidator<CreateOrderCommand>(
  z.object({
    customerId: CustomerIdSchema,
    items: z.array(OrderItemSchema).min(1, 'An order needs at least one item.'),
  }),
);

export const getOrderByIdValidator = new ZodValidator<GetOrderByIdQuery>(
  z.object({
    orderId: z.string().min(1, 'Order ID is required.'),
  }),
);

export const listCustomerOrdersValidator = new ZodValidator<ListCustomerOrdersQuery>(
  z.object({
    customerId: CustomerIdSchema,
  }),
);
