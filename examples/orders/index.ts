/**
 * Orders sample - composition root.
 *
 * Run with: npm run example
 */

import { v4 as uuidv4 } from 'uuid';
import {
  IPipelineBehavior,
  LoggingBehavior,
  Mediator,
  MediatorBuilder,
  MediatorOptions,
  consoleLogger,
  loadMediatorConfig,
} from '../../src';
import { CreateOrderHandler, GetOrderByIdHandler, ListCustomerOrdersHandler } from './handlers';
import { InMemoryOrderRepository } from './InMemoryOrderRepository';
import {
  CreateOrderCommand,
  GetOrderByIdQuery,
  IOrderRepository,
  ListCustomerOrdersQuery,
} from './orders';

export * from './orders';
export * from './handlers';
export { InMemoryOrderRepository } from './InMemoryOrderRepository';

/**
 * Wire the order handlers into a mediator.
 */
export function createOrdersMediator(
  orders: IOrderRepository,
  options: MediatorOptions = {},
  behaviors: readonly IPipelineBehavior[] = [],
): Mediator {
  const builder = MediatorBuilder.create(options);
  for (const behavior of behaviors) {
    builder.addBehavior(behavior);
  }
  return builder
    .addHandler(CreateOrderHandler, (scope) => new CreateOrderHandler(scope, orders))
    .addHandler(GetOrderByIdHandler, (scope) => new GetOrderByIdHandler(scope, orders))
    .addHandler(ListCustomerOrdersHandler, (scope) => new ListCustomerOrdersHandler(scope, orders))
    .build();
}

async function main(): Promise<void> {
  const mediator = createOrdersMediator(new InMemoryOrderRepository(), loadMediatorConfig(), [
    new LoggingBehavior(consoleLogger),
  ]);

  const customerId = uuidv4();

  const created = await mediator.dispatch(
    new CreateOrderCommand(customerId, [{ productId: 'sku-1', quantity: 2, unitPrice: 9.5 }]),
  );
  console.log('Create:', JSON.stringify(created));

  const missing = await mediator.dispatch(new GetOrderByIdQuery(uuidv4()));
  console.log('Get unknown:', JSON.stringify(missing));

  const page = await mediator.dispatch(new ListCustomerOrdersQuery(customerId, 1, 20));
  console.log('List:', JSON.stringify(page));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
