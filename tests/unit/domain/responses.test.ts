/**
 * @fileoverview Response and PagedResponse contract tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  HttpStatus,
  InvalidPaginationError,
  Notification,
  Notificator,
  PagedResponse,
  Response,
  ResponseContractError,
  calculateOffset,
  calculateTotalPages,
} from '../../../src';
import { expectFailure, expectSuccess } from '../../helpers';

const notFound = Notification.general('Order not found.');

describe('Response', () => {
  describe('success', () => {
    it('should carry data with code 200 and no notifications', () => {
      const response = Response.success({ id: 'order-1' });

      expectSuccess(response);
      expect(response.data).toEqual({ id: 'order-1' });
    });

    it('should accept another 2xx code', () => {
      expectSuccess(Response.success('order-1', HttpStatus.CREATED), 201);
    });

    it('should reject undefined data', () => {
      expect(() => Response.success(undefined)).toThrow(ResponseContractError);
    });

    it('should reject null data', () => {
      expect(() => Response.success(null)).toThrow('A success response must carry data');
    });

    it('should reject a missing lookup result', () => {
      const found: { id: string } | null = null;

      expect(() => Response.success(found)).toThrow(ResponseContractError);
    });

    it('should keep falsy values that are present', () => {
      expect(Response.success(0).data).toBe(0);
      expect(Response.success('').data).toBe('');
      expect(Response.success(false).data).toBe(false);
    });

    it('should reject non-2xx codes', () => {
      expect(() => Response.success('x', 404)).toThrow(
        'Success code must be a 2xx status, got 404',
      );
    });
  });

  describe('failure', () => {
    it('should default to 400', () => {
      const response = Response.failure([new Notification('name', 'Name is required.')]);

      expectFailure(response, 400, ['Name is required.']);
      expect(response.notifications[0].field).toBe('name');
    });

    it('should accept a failure-site code', () => {
      expectFailure(Response.failure([notFound], HttpStatus.NOT_FOUND), 404, ['Order not found.']);
    });

    it('should require at least one notification', () => {
      expect(() => Response.failure([])).toThrow(
        'A failure response needs at least one notification',
      );
    });

    it('should reject success codes', () => {
      expect(() => Response.failure([notFound], 200)).toThrow(ResponseContractError);
    });

    it('should copy the notifications it is given', () => {
      const notifications = [notFound];
      const response = Response.failure(notifications);
      notifications.push(Notification.general('late'));

      expect(response.messages).toEqual(['Order not found.']);
    });

    it('should build from a notificator', () => {
      const notificator = new Notificator();
      notificator.append(new Notification('customerId', 'Customer ID cannot be empty.'));
      notificator.append(new Notification('items', 'An order needs at least one item.'));

      const response = Response.fromNotificator<string>(notificator);

      expectFailure(response, 400, [
        'Customer ID cannot be empty.',
        'An order needs at least one item.',
      ]);
    });
  });

  it('should be frozen', () => {
    const response = Response.success(1);

    expect(Object.isFrozen(response)).toBe(true);
    expect(Object.isFrozen(response.notifications)).toBe(true);
  });

  it('should unwrap data only on success', () => {
    expect(Response.success('abc').unwrap()).toBe('abc');
    expect(() => Response.failure([notFound], 404).unwrap()).toThrow(
      'Cannot unwrap a failed response (404): Order not found.',
    );
  });

  it('should serialize for transports', () => {
    expect(Response.success({ id: 'a' }).toJSON()).toEqual({
      isSuccess: true,
      data: { id: 'a' },
      notifications: [],
      code: 200,
    });
    expect(Response.failure([notFound], 404).toJSON()).toEqual({
      isSuccess: false,
      notifications: [{ field: '', message: 'Order not found.' }],
      code: 404,
    });
  });
});

describe('PagedResponse', () => {
  const page = (size: number): string[] => Array.from({ length: size }, (_, i) => `item-${i}`);

  describe('totalPages', () => {
    it('should round partial pages up', () => {
      expect(PagedResponse.success(page(20), 101, 1, 20).totalPages).toBe(6);
    });

    it('should be exact for full pages', () => {
      expect(PagedResponse.success(page(20), 100, 1, 20).totalPages).toBe(5);
    });

    it('should be 0 for an empty result', () => {
      expect(PagedResponse.empty(1, 20).totalPages).toBe(0);
    });

    it('should match calculateTotalPages', () => {
      expect(calculateTotalPages(1, 10)).toBe(1);
      expect(calculateTotalPages(11, 10)).toBe(2);
    });
  });

  describe('success', () => {
    it('should carry the page and paging data', () => {
      const response = PagedResponse.success(page(2), 7, 2, 5);

      expectSuccess(response);
      expect(response.data).toEqual(['item-0', 'item-1']);
      expect(response.totalCount).toBe(7);
      expect(response.pageNumber).toBe(2);
      expect(response.pageSize).toBe(5);
      expect(response.totalPages).toBe(2);
    });

    it('should report neighbouring pages', () => {
      const first = PagedResponse.success(page(20), 101, 1, 20);
      const last = PagedResponse.success(page(1), 101, 6, 20);

      expect(first.hasPreviousPage).toBe(false);
      expect(first.hasNextPage).toBe(true);
      expect(last.hasPreviousPage).toBe(true);
      expect(last.hasNextPage).toBe(false);
    });

    it('should reject a page size below 1', () => {
      expect(() => PagedResponse.success([], 0, 1, 0)).toThrow('Invalid pageSize: 0');
    });

    it('should reject a page number below 1', () => {
      expect(() => PagedResponse.success([], 0, 0, 10)).toThrow(InvalidPaginationError);
    });

    it('should reject non-integer paging', () => {
      expect(() => PagedResponse.success([], 0, 1.5, 10)).toThrow('Invalid pageNumber: 1.5');
    });

    it('should reject a negative total count', () => {
      expect(() => PagedResponse.success([], -1, 1, 10)).toThrow('Invalid totalCount: -1');
    });

    it('should reject more items than the total count', () => {
      expect(() => PagedResponse.success(page(3), 2, 1, 10)).toThrow(
        'Page holds 3 items but totalCount is 2',
      );
    });
  });

  describe('failure', () => {
    it('should carry no data, a zero count and default paging', () => {
      const response = PagedResponse.failure<string>([Notification.general('No records found.')], 404);

      expectFailure(response, 404, ['No records found.']);
      expect(response.totalCount).toBe(0);
      expect(response.totalPages).toBe(0);
      expect(response.pageNumber).toBe(1);
      expect(response.pageSize).toBe(10);
    });

    it('should echo the requested paging', () => {
      const response = PagedResponse.failure([notFound], 400, { pageNumber: 3, pageSize: 25 });

      expect(response.pageNumber).toBe(3);
      expect(response.pageSize).toBe(25);
    });

    it('should require at least one notification', () => {
      expect(() => PagedResponse.failure([])).toThrow(ResponseContractError);
    });
  });

  it('should serialize paging data', () => {
    expect(PagedResponse.success(['a'], 1, 1, 10).toJSON()).toEqual({
      isSuccess: true,
      data: ['a'],
      notifications: [],
      code: 200,
      totalCount: 1,
      pageNumber: 1,
      pageSize: 10,
      totalPages: 1,
    });
  });

  it('should compute offsets from paging', () => {
    expect(calculateOffset({ pageNumber: 1, pageSize: 20 })).toBe(0);
    expect(calculateOffset({ pageNumber: 3, pageSize: 20 })).toBe(40);
  });
});

describe('Envelope invariants', () => {
  it('should tie isSuccess to empty notifications and present data', () => {
    const responses: Array<Response<unknown> | PagedResponse<unknown>> = [
      Response.success(0),
      Response.success(''),
      Response.failure([notFound]),
      Response.failure([notFound, Notification.general('second')], 500),
      PagedResponse.success([], 0, 1, 10),
      PagedResponse.success(['a'], 5, 1, 1),
      PagedResponse.failure([notFound], 404),
    ];

    for (const response of responses) {
      expect(response.isSuccess).toBe(response.notifications.length === 0);
      expect(response.isSuccess).toBe(response.data !== undefined);
    }
  });
});
