/**
 * Orders sample - handlers.
 */

import {
  CommandHandler,
  HandlerContext,
  HandlerScope,
  Handles,
  HttpStatus,
  PagedQueryHandler,
  PagedResponse,
  QueryHandler,
  Response,
} from '../../src';
import {
  CreateOrderCommand,
  GetOrderByIdQuery,
  IOrderRepository,
  ListCustomerOrdersQuery,
  OrderDto,
  createOrderValidator,
  getOrderByIdValidator,
  listCustomerOrdersValidator,
} from './orders';

@Handles(CreateOrderCommand)
export class CreateOrderHandler extends CommandHandler<CreateOrderCommand, string> {
  constructor(
    scope: HandlerScope,
    private readonly orders: IOrderRepository,
    private readonly creationFailureCode: number = HttpStatus.BAD_REQUEST,
  ) {
    super(scope);
  }

  async execute(command: CreateOrderCommand, context: HandlerContext): Promise<Response<string>> {
    if (!(await this.executeValidation(createOrderValidator, command, context.signal))) {
      return this.fail();
    }

    const orderId = await this.orders.create(
      { customerId: command.customerId, items: command.items },
      context.signal,
    );
    context.throwIfCancelled();

    if (!orderId) {
      this.logger.warn('Order could not be stored', {
        traceId: context.traceId,
        customerId: command.customerId,
      });
      this.notify('Failed to create the order.');
      return this.fail(this.creationFailureCode);
    }

    return Response.success(orderId);
  }
}

@Handles(GetOrderByIdQuery)
export class GetOrderByIdHandler extends QueryHandler<GetOrderByIdQuery, OrderDto> {
  constructor(
    scope: HandlerScope,
    private readonly orders: IOrderRepository,
  ) {
    super(scope);
  }

  async execute(query: GetOrderByIdQuery, context: HandlerContext): Promise<Response<OrderDto>> {
    if (!(await this.executeValidation(getOrderByIdValidator, query, context.signal))) {
      return this.fail();
    }

    const order = await this.orders.findById(query.orderId, context.signal);
    context.throwIfCancelled();

    if (!order) {
      this.notify('Order not found.');
      return this.fail(HttpStatus.NOT_FOUND);
    }

    return Response.success(order);
  }
}

@Handles(ListCustomerOrdersQuery)
export class ListCustomerOrdersHandler extends PagedQueryHandler<ListCustomerOrdersQuery, OrderDto> {
  constructor(
    scope: HandlerScope,
    private readonly orders: IOrderRepository,
  ) {
    super(scope);
  }

  async execute(
    query: ListCustomerOrdersQuery,
    context: HandlerContext,
  ): Promise<PagedResponse<OrderDto>> {
    if (!(await this.executeValidation(listCustomerOrdersValidator, query, context.signal))) {
      return this.fail(query);
    }

    const [orders, totalCount] = await this.orders.findByCustomer(
      query.customerId,
      query.skip,
      query.pageSize,
      context.signal,
    );
    context.throwIfCancelled();

    return this.page(orders, totalCount, query);
  }
}
