/**
 * @fileoverview Jest test setup
 *
 * Loads reflect-metadata before any decorated handler class and keeps
 * console output from the default logger out of test runs.
 */

import 'reflect-metadata';
import { afterEach, beforeEach, jest } from '@jest/globals';

beforeEach(() => {
  jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  jest.spyOn(console, 'info').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});
