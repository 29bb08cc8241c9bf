/**
 * Jest Setup
 * Mock Redis and the BullMQ queue registry for tests
 */

jest.mock('@swapbook/shared', () => {
  const actual: object = jest.requireActual('@swapbook/shared');

  const mockRedis = {
    get: jest.fn().mockResolvedValue(null),
    setex: jest.fn().mockResolvedValue('OK'),
    del: jest.fn().mockResolvedValue(1),
    ping: jest.fn().mockResolvedValue('PONG'),
    quit: jest.fn().mockResolvedValue('OK'),
  };

  const mockQueue = {
    add: jest.fn().mockResolvedValue({ id: 'job-1' }),
  };

  return {
    ...actual,
    getRedisClient: jest.fn(() => mockRedis),
    closeRedis: jest.fn().mockResolvedValue(undefined),
    getQueue: jest.fn(() => mockQueue),
    closeQueues: jest.fn().mockResolvedValue(undefined),
    getQueueHealth: jest.fn(),
    getAllQueuesHealth: jest.fn().mockResolvedValue([]),
  };
});
