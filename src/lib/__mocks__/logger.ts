/**
 * Manual mock for logger module
 */

const createMockLogger = () => {
  const mock = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(),
  };
  mock.child.mockReturnValue(mock);
  return mock;
};

export const logger = createMockLogger();

export const logCycleStart = jest.fn();
export const logCycleCompletion = jest.fn();
export const logCycleError = jest.fn();
