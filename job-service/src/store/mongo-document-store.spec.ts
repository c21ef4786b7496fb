import { Logger } from '@nestjs/common';
import { MongoBulkWriteError, MongoClient, MongoServerError } from 'mongodb';
import { DocumentExistsError } from './document-store.interface';
import { MongoDocumentStore } from './mongo-document-store';

interface FakeRecord {
  kind?: string;
  source?: object;
  pendingSource?: object;
}

describe('MongoDocumentStore', () => {
  let store: MongoDocumentStore;
  let collection: {
    updateOne: jest.Mock;
    insertOne: jest.Mock;
    bulkWrite: jest.Mock;
    updateMany: jest.Mock;
    findOne: jest.Mock;
  };
  let db: { collection: jest.Mock };
  let client: { db: jest.Mock; connect: jest.Mock; close: jest.Mock };

  beforeEach(() => {
    collection = {
      updateOne: jest.fn().mockResolvedValue({ acknowledged: true }),
      insertOne: jest.fn().mockResolvedValue({ acknowledged: true }),
      bulkWrite: jest.fn().mockResolvedValue({ ok: 1 }),
      updateMany: jest.fn().mockResolvedValue({ modifiedCount: 2 }),
      findOne: jest.fn().mockResolvedValue(null),
    };
    db = { collection: jest.fn().mockReturnValue(collection) };
    client = {
      db: jest.fn().mockReturnValue(db),
      connect: jest.fn().mockResolvedValue(undefined),
      close: jest.fn().mockResolvedValue(undefined),
    };

    store = new MongoDocumentStore(client as unknown as MongoClient, 'anomaly_jobs');

    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => { });
    jest.spyOn(Logger.prototype, 'verbose').mockImplementation(() => { });
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('lifecycle', () => {
    it('should connect on init and close on destroy', async () => {
      await store.onModuleInit();
      await store.onModuleDestroy();

      expect(client.connect).toHaveBeenCalledTimes(1);
      expect(client.close).toHaveBeenCalledTimes(1);
    });

    it('should fail init when the connection fails (Edge Case)', async () => {
      client.connect.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(store.onModuleInit()).rejects.toThrow('ECONNREFUSED');
    });
  });

  describe('index', () => {
    it('should upsert the pending version into the collection named after the index (Happy Path)', async () => {
      // Act
      await store.index({ index: 'ml-state', kind: 'quantiles', id: 'web-farm_quantiles', document: { quantileState: 'q' } });

      // Assert
      expect(client.db).toHaveBeenCalledWith('anomaly_jobs');
      expect(db.collection).toHaveBeenCalledWith('ml-state');
      expect(collection.updateOne).toHaveBeenCalledWith(
        { _id: 'web-farm_quantiles' },
        { $set: { kind: 'quantiles', pendingSource: { quantileState: 'q' } } },
        { upsert: true },
      );
    });
  });

  describe('create', () => {
    it('should insert a new pending record', async () => {
      await store.create({ index: 'ml-config', kind: 'job', id: 'web-farm', document: { jobId: 'web-farm' } });

      expect(collection.insertOne).toHaveBeenCalledWith({
        _id: 'web-farm',
        kind: 'job',
        pendingSource: { jobId: 'web-farm' },
      });
    });

    it('should report a duplicate key as an existing document (Edge Case)', async () => {
      collection.insertOne.mockRejectedValue(
        Object.assign(Object.create(MongoServerError.prototype), { code: 11000, message: 'E11000 duplicate key' }),
      );

      await expect(
        store.create({ index: 'ml-config', kind: 'job', id: 'web-farm', document: {} }),
      ).rejects.toThrow(DocumentExistsError);
    });

    it('should propagate other insert failures (Edge Case)', async () => {
      collection.insertOne.mockRejectedValue(new Error('not primary'));

      await expect(
        store.create({ index: 'ml-config', kind: 'job', id: 'web-farm', document: {} }),
      ).rejects.toThrow('not primary');
    });
  });

  describe('bulk', () => {
    it('should send one unordered bulk write per index', async () => {
      // Act
      const response = await store.bulk([
        { index: 'a', kind: 'bucket', id: 'b1', document: { n: 1 } },
        { index: 'b', kind: 'record', id: 'r1', document: { n: 2 } },
        { index: 'a', kind: 'bucket', id: 'b2', document: { n: 3 } },
      ]);

      // Assert
      expect(response.hasFailures).toBe(false);
      expect(collection.bulkWrite).toHaveBeenCalledTimes(2);
      expect(collection.bulkWrite).toHaveBeenNthCalledWith(
        1,
        [
          { updateOne: { filter: { _id: 'b1' }, update: { $set: { kind: 'bucket', pendingSource: { n: 1 } } }, upsert: true } },
          { updateOne: { filter: { _id: 'b2' }, update: { $set: { kind: 'bucket', pendingSource: { n: 3 } } }, upsert: true } },
        ],
        { ordered: false },
      );
      expect(db.collection.mock.calls.map((call) => call[0])).toEqual(['a', 'b']);
    });

    it('should mark the items a bulk write error names as failed (Edge Case)', async () => {
      // Arrange
      const bulkError = Object.assign(Object.create(MongoBulkWriteError.prototype), {
        message: 'bulk write failed',
        writeErrors: [{ index: 1, errmsg: 'E11000 duplicate key' }],
      });
      collection.bulkWrite.mockRejectedValue(bulkError);

      // Act
      const response = await store.bulk([
        { index: 'a', kind: 'record', id: 'r1', document: {} },
        { index: 'a', kind: 'record', id: 'r2', document: {} },
      ]);

      // Assert
      expect(response).toEqual({
        hasFailures: true,
        items: [
          { index: 'a', id: 'r1', ok: true },
          { index: 'a', id: 'r2', ok: false, error: 'E11000 duplicate key' },
        ],
      });
    });

    it('should fail every item of the index when the error names no item (Edge Case)', async () => {
      // Arrange
      const bulkError = Object.assign(Object.create(MongoBulkWriteError.prototype), {
        message: 'waiting for replication timed out',
        writeErrors: [],
      });
      collection.bulkWrite.mockRejectedValue(bulkError);

      // Act
      const response = await store.bulk([
        { index: 'a', kind: 'record', id: 'r1', document: {} },
        { index: 'a', kind: 'record', id: 'r2', document: {} },
      ]);

      // Assert
      expect(response).toEqual({
        hasFailures: true,
        items: [
          { index: 'a', id: 'r1', ok: false, error: 'waiting for replication timed out' },
          { index: 'a', id: 'r2', ok: false, error: 'waiting for replication timed out' },
        ],
      });
    });

    it('should propagate errors that are not bulk write errors (Edge Case)', async () => {
      collection.bulkWrite.mockRejectedValue(new Error('connection reset'));

      await expect(
        store.bulk([{ index: 'a', kind: 'record', id: 'r1', document: {} }]),
      ).rejects.toThrow('connection reset');
    });
  });

  describe('refresh and get', () => {
    it('should promote the pending version of every record in the collection', async () => {
      await store.refresh('ml-config');

      expect(collection.updateMany).toHaveBeenCalledWith(
        { pendingSource: { $exists: true } },
        [{ $set: { source: '$pendingSource' } }, { $unset: 'pendingSource' }],
      );
    });

    it('should read only published records and return their source', async () => {
      // Arrange
      collection.findOne.mockResolvedValue({ _id: 'web-farm', kind: 'job', source: { jobId: 'web-farm' } });

      // Act
      const document = await store.get('ml-config', 'web-farm');

      // Assert
      expect(collection.findOne).toHaveBeenCalledWith({ _id: 'web-farm', source: { $exists: true } });
      expect(document).toEqual({ jobId: 'web-farm' });
    });

    it('should return null for a missing record', async () => {
      expect(await store.get('ml-config', 'nope')).toBeNull();
    });

    it('should keep serving the published version of an overwritten record until refresh', async () => {
      // Arrange
      const records = new Map<string, FakeRecord>();
      collection.updateOne.mockImplementation(
        async (filter: { _id: string }, update: { $set: FakeRecord }) => {
          records.set(filter._id, { ...records.get(filter._id), ...update.$set });
        },
      );
      collection.updateMany.mockImplementation(async () => {
        for (const record of records.values()) {
          if (record.pendingSource) {
            record.source = record.pendingSource;
            delete record.pendingSource;
          }
        }
        return { modifiedCount: records.size };
      });
      collection.findOne.mockImplementation(async (filter: { _id: string }) => {
        const record = records.get(filter._id);
        return record?.source ? record : null;
      });

      await store.index({ index: 'ml-config', kind: 'job', id: 'web-farm', document: { description: 'first' } });
      await store.refresh('ml-config');

      // Act
      await store.index({ index: 'ml-config', kind: 'job', id: 'web-farm', document: { description: 'second' } });
      const beforeRefresh = await store.get('ml-config', 'web-farm');
      await store.refresh('ml-config');
      const afterRefresh = await store.get('ml-config', 'web-farm');

      // Assert
      expect(beforeRefresh).toEqual({ description: 'first' });
      expect(afterRefresh).toEqual({ description: 'second' });
    });
  });
});
