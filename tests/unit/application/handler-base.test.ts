/**
 * @fileoverview Handler base workflow tests
 */

import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import {
  CommandBase,
  CommandHandler,
  DEFAULT_EMPTY_PAGE_MESSAGE,
  EmptyPagePolicy,
  HandlerScope,
  IValidator,
  Notificator,
  OperationCancelledError,
  PagedQueryBase,
  PagedQueryHandler,
  PagedResponse,
  PaginationParams,
  Response,
  ZodValidator,
  acceptAll,
  createValidator,
  silentLogger,
} from '../../../src';
import { expectFailure, expectSuccess } from '../../helpers';

class RegisterUserCommand extends CommandBase<string> {
  constructor(
    readonly name: string,
    readonly age: number,
  ) {
    super();
  }
}

class ListUsersQuery extends PagedQueryBase<string> {
  constructor(pageNumber?: number, pageSize?: number) {
    super(pageNumber, pageSize);
  }
}

/** Exposes the protected workflow for direct testing. */
class ProbeCommandHandler extends CommandHandler<RegisterUserCommand, string> {
  constructor(scope: HandlerScope) {
    super(scope);
  }

  async execute(command: RegisterUserCommand): Promise<Response<string>> {
    return Response.success(command.name);
  }

  validate(validator: IValidator<RegisterUserCommand>, command: RegisterUserCommand): Promise<boolean> {
    return this.executeValidation(validator, command);
  }

  raise(message: string, field?: string): void {
    this.notify(message, field);
  }

  notifications() {
    return this.getNotifications();
  }

  failed(): boolean {
    return this.hasNotification();
  }

  failure(code?: number): Response<string> {
    return this.fail(code);
  }
}

class ProbePagedHandler extends PagedQueryHandler<ListUsersQuery, string> {
  constructor(scope: HandlerScope) {
    super(scope);
  }

  async execute(query: ListUsersQuery): Promise<PagedResponse<string>> {
    return this.page([], 0, query);
  }

  respond(items: readonly string[], totalCount: number, paging: PaginationParams): PagedResponse<string> {
    return this.page(items, totalCount, paging);
  }
}

function createScope(
  emptyPagePolicy: EmptyPagePolicy = 'failure',
  emptyPageMessage: string = DEFAULT_EMPTY_PAGE_MESSAGE,
): HandlerScope {
  return { notificator: new Notificator(), logger: silentLogger, emptyPagePolicy, emptyPageMessage };
}

const userValidator = createValidator<RegisterUserCommand>((command) => [
  ...(command.name ? [] : [{ field: 'name', message: 'Name is required.' }]),
  ...(command.age > 0 ? [] : [{ field: 'age', message: 'Age must be positive.' }]),
]);

describe('RequestHandlerBase', () => {
  describe('executeValidation', () => {
    it('should return true and record nothing for a valid request', async () => {
      const handler = new ProbeCommandHandler(createScope());

      await expect(handler.validate(userValidator, new RegisterUserCommand('Ada', 36))).resolves.toBe(true);
      expect(handler.failed()).toBe(false);
    });

    it('should record one notification per failure, in order', async () => {
      const handler = new ProbeCommandHandler(createScope());

      await expect(handler.validate(userValidator, new RegisterUserCommand('', 0))).resolves.toBe(false);
      expect(handler.notifications().map((n) => [n.field, n.message])).toEqual([
        ['name', 'Name is required.'],
        ['age', 'Age must be positive.'],
      ]);
    });

    it('should accept everything with acceptAll', async () => {
      const handler = new ProbeCommandHandler(createScope());

      await expect(handler.validate(acceptAll(), new RegisterUserCommand('', 0))).resolves.toBe(true);
    });
  });

  describe('notify', () => {
    it('should default to an empty field path', () => {
      const handler = new ProbeCommandHandler(createScope());
      handler.raise('Failed to create the order.');

      expect(handler.notifications()[0].field).toBe('');
      expect(handler.notifications()[0].message).toBe('Failed to create the order.');
    });

    it('should keep a given field path', () => {
      const handler = new ProbeCommandHandler(createScope());
      handler.raise('Email already taken.', 'email');

      expect(handler.notifications()[0].field).toBe('email');
    });
  });

  it('should write to the notificator of its scope', () => {
    const scope = createScope();
    const handler = new ProbeCommandHandler(scope);
    handler.raise('Something failed.');

    expect(scope.notificator.list().map((n) => n.message)).toEqual(['Something failed.']);
  });

  it('should build failures from collected notifications', () => {
    const handler = new ProbeCommandHandler(createScope());
    handler.raise('Order not found.');

    expectFailure(handler.failure(404), 404, ['Order not found.']);
    expectFailure(handler.failure(), 400, ['Order not found.']);
  });
});

describe('PagedQueryHandler.page', () => {
  it('should return a 404 failure for an empty result under the failure policy', () => {
    const response = new ProbePagedHandler(createScope()).respond([], 0, { pageNumber: 2, pageSize: 5 });

    expectFailure(response, 404, ['No records found.']);
    expect(response.pageNumber).toBe(2);
    expect(response.pageSize).toBe(5);
    expect(response.totalCount).toBe(0);
  });

  it('should use the configured empty-page message', () => {
    const response = new ProbePagedHandler(createScope('failure', 'Nothing here.')).respond([], 0, {
      pageNumber: 1,
      pageSize: 10,
    });

    expectFailure(response, 404, ['Nothing here.']);
  });

  it('should return an empty success under the success policy', () => {
    const response = new ProbePagedHandler(createScope('success')).respond([], 0, {
      pageNumber: 1,
      pageSize: 10,
    });

    expectSuccess(response);
    expect(response.data).toEqual([]);
    expect(response.totalPages).toBe(0);
  });

  it('should return the page for a non-empty result', () => {
    const response = new ProbePagedHandler(createScope()).respond(['a', 'b'], 5, {
      pageNumber: 1,
      pageSize: 2,
    });

    expectSuccess(response);
    expect(response.totalPages).toBe(3);
    expect(response.hasNextPage).toBe(true);
  });
});

describe('ZodValidator', () => {
  const validator = new ZodValidator<{ name: string; tags: string[] }>(
    z.object({
      name: z.string().min(1, 'Name is required.'),
      tags: z.array(z.string().min(1, 'Tag cannot be empty.')),
    }),
  );

  it('should return no failures for valid input', () => {
    expect(validator.validate({ name: 'Ada', tags: ['x'] })).toEqual([]);
  });

  it('should map every issue to a failure with a dotted field path', () => {
    expect(validator.validate({ name: '', tags: ['ok', ''] })).toEqual([
      { field: 'name', message: 'Name is required.' },
      { field: 'tags.1', message: 'Tag cannot be empty.' },
    ]);
  });

  it('should keep schema order when refinements precede plain checks', () => {
    const refined = new ZodValidator<{ code: string; lines: string[] }>(
      z.object({
        code: z.string().refine((code) => code.length > 0, 'Code is required.'),
        lines: z.array(z.string()).min(1, 'At least one line is required.'),
      }),
    );

    expect(refined.validate({ code: '', lines: [] })).toEqual([
      { field: 'code', message: 'Code is required.' },
      { field: 'lines', message: 'At least one line is required.' },
    ]);
  });

  it('should refuse to validate once cancelled', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => validator.validate({ name: 'Ada', tags: [] }, controller.signal)).toThrow(
      OperationCancelledError,
    );
  });
});
