/**
 * Database Configuration Unit Tests
 *
 * Tests MongoDB connection management with mongoose mocked.
 */

const mockMongooseConnect = jest.fn().mockResolvedValue({ connection: { host: 'localhost' } });
const mockMongooseDisconnect = jest.fn().mockResolvedValue(undefined);
const mockMongooseOn = jest.fn();

jest.mock('mongoose', () => ({
  connect: mockMongooseConnect,
  disconnect: mockMongooseDisconnect,
  connection: { readyState: 1, on: mockMongooseOn },
}));

jest.mock('../../../src/config/index', () => ({
  config: {
    mongodb: {
      uri: 'mongodb://localhost:27017/ledger-test',
      maxPoolSize: 10,
      minPoolSize: 2,
      maxIdleTimeMS: 30000,
      serverSelectionTimeoutMS: 5000,
    },
  },
}));

const mockLogger = { info: jest.fn(), error: jest.fn(), warn: jest.fn(), debug: jest.fn() };
jest.mock('../../../src/observability/logger', () => ({
  createServiceLogger: () => mockLogger,
}));

type DatabaseModule = typeof import('../../../src/config/database');

describe('Database Configuration', () => {
  let database: DatabaseModule;

  beforeEach(async () => {
    jest.resetModules();
    database = await import('../../../src/config/database');
  });

  describe('connectDatabase', () => {
    it('should connect with the pool settings', async () => {
      await database.connectDatabase();

      expect(mockMongooseConnect).toHaveBeenCalledWith('mongodb://localhost:27017/ledger-test', {
        maxPoolSize: 10,
        minPoolSize: 2,
        maxIdleTimeMS: 30000,
        serverSelectionTimeoutMS: 5000,
      });
      expect(database.getDatabaseStatus()).toEqual({ connected: true, readyState: 1 });
    });

    it('should not reconnect if already connected', async () => {
      await database.connectDatabase();
      await database.connectDatabase();

      expect(mockMongooseConnect).toHaveBeenCalledTimes(1);
    });

    it('should rethrow connection failures', async () => {
      mockMongooseConnect.mockRejectedValueOnce(new Error('Connection failed'));

      await expect(database.connectDatabase()).rejects.toThrow('Connection failed');
      expect(database.getDatabaseStatus().connected).toBe(false);
      expect(mockLogger.error).toHaveBeenCalledWith(
        { err: expect.any(Error) },
        'MongoDB connection error'
      );
    });
  });

  describe('disconnectDatabase', () => {
    it('should do nothing when not connected', async () => {
      await database.disconnectDatabase();

      expect(mockMongooseDisconnect).not.toHaveBeenCalled();
    });

    it('should disconnect after connecting', async () => {
      await database.connectDatabase();
      await database.disconnectDatabase();

      expect(mockMongooseDisconnect).toHaveBeenCalledTimes(1);
      expect(database.getDatabaseStatus().connected).toBe(false);
    });
  });

  describe('connection events', () => {
    it('should mark the database disconnected when mongoose reports it', async () => {
      await database.connectDatabase();

      const disconnected = mockMongooseOn.mock.calls.filter(([event]) => event === 'disconnected').pop();
      if (!disconnected) {
        throw new Error('disconnected handler not registered');
      }
      disconnected[1]();

      expect(database.getDatabaseStatus().connected).toBe(false);
    });
  });
});
