import { describe, it, expect, vi } from 'vitest';
import type { AttendanceSession, User } from '@rollcall/shared';
import { DynamoCollection, type TableClient } from './dynamodb.js';
import { attendanceCollection, sessionsCollection, usersCollection } from './collections.js';
import { DuplicateKeyError, StorageError } from './errors.js';

function fakeClient() {
  return {
    get: vi.fn<TableClient['get']>(),
    put: vi.fn<TableClient['put']>(),
    update: vi.fn<TableClient['update']>(),
    delete: vi.fn<TableClient['delete']>(),
    query: vi.fn<TableClient['query']>(),
    scan: vi.fn<TableClient['scan']>(),
  } satisfies TableClient;
}

function conditionalFailure(): Error {
  const err = new Error('The conditional request failed');
  err.name = 'ConditionalCheckFailedException';
  return err;
}

// As DynamoDB returns it: null fields are absent.
const aliceItem = {
  username: 'alice',
  passwordHash: 'hashed',
  email: 'a@x.com',
  name: 'Alice',
  role: 'teacher',
  status: 'active',
  failedAttempts: 0,
  isLocked: false,
  twoFactorEnabled: false,
  createdAt: '2024-01-01T00:00:00.000Z',
} as const;

const alice: User = {
  ...aliceItem,
  lockoutUntil: null,
  lastLogin: null,
  passwordResetToken: null,
  passwordResetExpires: null,
  lastModified: null,
};

function sessionItem(sessionId: string): AttendanceSession {
  return {
    sessionId,
    course: 'CS101',
    description: 'Lecture 1',
    createdBy: 'alice',
    createdAt: '2024-01-01T00:00:00.000Z',
    expiresAt: '2024-01-01T01:00:00.000Z',
    isActive: true,
    attendanceCount: 0,
    ttl: 1704070800,
  };
}

describe('DynamoCollection', () => {
  it('reads by table key with a consistent get and restores null fields', async () => {
    const client = fakeClient();
    client.get.mockResolvedValue({ Item: aliceItem, $metadata: {} });
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    await expect(users.findOne({ username: 'alice' })).resolves.toEqual(alice);
    expect(client.get).toHaveBeenCalledWith({
      TableName: 'users-table',
      Key: { username: 'alice' },
      ConsistentRead: true,
    });
    expect(client.query).not.toHaveBeenCalled();
  });

  it('applies the rest of the filter to the fetched item', async () => {
    const client = fakeClient();
    client.get.mockResolvedValue({ Item: aliceItem, $metadata: {} });
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    await expect(users.findOne({ username: 'alice', status: 'inactive' })).resolves.toBeNull();
  });

  it('uses both key attributes for a composite key', async () => {
    const client = fakeClient();
    client.get.mockResolvedValue({ $metadata: {} });
    const attendance = new DynamoCollection(client, 'attendance-table', attendanceCollection);

    await expect(attendance.findOne({ studentId: 'S1', date: '2024-03-05' })).resolves.toBeNull();
    expect(client.get).toHaveBeenCalledWith({
      TableName: 'attendance-table',
      Key: { studentId: 'S1', date: '2024-03-05' },
      ConsistentRead: true,
    });
  });

  it('queries the secondary index for an indexed field', async () => {
    const client = fakeClient();
    client.query.mockResolvedValue({ Items: [aliceItem], $metadata: {} });
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    await expect(users.find({ email: 'a@x.com' })).resolves.toEqual([alice]);
    expect(client.query).toHaveBeenCalledWith({
      TableName: 'users-table',
      IndexName: 'email-index',
      KeyConditionExpression: '#email = :v0',
      FilterExpression: undefined,
      ExpressionAttributeNames: { '#email': 'email' },
      ExpressionAttributeValues: { ':v0': 'a@x.com' },
      ExclusiveStartKey: undefined,
    });
  });

  it('follows scan pages until no key is left', async () => {
    const client = fakeClient();
    client.scan
      .mockResolvedValueOnce({ Items: [sessionItem('s1')], LastEvaluatedKey: { sessionId: 's1' }, $metadata: {} })
      .mockResolvedValueOnce({ Items: [sessionItem('s2')], $metadata: {} });
    const sessions = new DynamoCollection(client, 'sessions-table', sessionsCollection);

    const found = await sessions.find({ isActive: true });

    expect(found.map((s) => s.sessionId)).toEqual(['s1', 's2']);
    expect(client.scan).toHaveBeenCalledTimes(2);
    expect(client.scan).toHaveBeenLastCalledWith({
      TableName: 'sessions-table',
      FilterExpression: '#isActive = :v0',
      ExpressionAttributeNames: { '#isActive': 'isActive' },
      ExpressionAttributeValues: { ':v0': true },
      ExclusiveStartKey: { sessionId: 's1' },
    });
  });

  it('writes inserts conditionally and leaves null fields off the item', async () => {
    const client = fakeClient();
    client.put.mockResolvedValue({ $metadata: {} });
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    await users.insertOne(alice);

    expect(client.put).toHaveBeenCalledWith({
      TableName: 'users-table',
      Item: aliceItem,
      ConditionExpression: 'attribute_not_exists(#username)',
      ExpressionAttributeNames: { '#username': 'username' },
    });
  });

  it('reports a taken key as DuplicateKeyError', async () => {
    const client = fakeClient();
    client.put.mockRejectedValue(conditionalFailure());
    const attendance = new DynamoCollection(client, 'attendance-table', attendanceCollection);

    const err = await attendance
      .insertOne({
        studentId: 'S1',
        date: '2024-03-05',
        time: '09:00:00',
        ts: '2024-03-05T09:00:00.000Z',
        status: 1,
        course: null,
        method: 'manual_entry',
        createdBy: 'alice',
        updatedBy: null,
        updatedAt: null,
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DuplicateKeyError);
    expect(err).toHaveProperty('message', 'Duplicate key in attendance: studentId, date');
  });

  it('renders set, remove and add clauses guarded by the filter', async () => {
    const client = fakeClient();
    client.update.mockResolvedValue({
      Attributes: { ...aliceItem, status: 'inactive', failedAttempts: 1 },
      $metadata: {},
    });
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    const updated = await users.updateOne(
      { username: 'alice' },
      { $set: { status: 'inactive', lockoutUntil: null }, $inc: { failedAttempts: 1 } },
    );

    expect(updated).toEqual({ ...alice, status: 'inactive', failedAttempts: 1 });
    expect(client.update).toHaveBeenCalledWith({
      TableName: 'users-table',
      Key: { username: 'alice' },
      UpdateExpression: 'SET #status = :v0 REMOVE #lockoutUntil ADD #failedAttempts :v1',
      ConditionExpression: 'attribute_exists(#username) AND #username = :v2',
      ExpressionAttributeNames: {
        '#status': 'status',
        '#lockoutUntil': 'lockoutUntil',
        '#failedAttempts': 'failedAttempts',
        '#username': 'username',
      },
      ExpressionAttributeValues: { ':v0': 'inactive', ':v1': 1, ':v2': 'alice' },
      ReturnValues: 'ALL_NEW',
    });
  });

  it('returns null when the guarded update no longer matches', async () => {
    const client = fakeClient();
    client.update.mockRejectedValue(conditionalFailure());
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    await expect(users.updateOne({ username: 'alice' }, { $set: { status: 'inactive' } })).resolves.toBeNull();
  });

  it('looks the key up first when the filter does not carry it', async () => {
    const client = fakeClient();
    client.query.mockResolvedValue({ Items: [{ ...aliceItem, passwordResetToken: 'tok' }], $metadata: {} });
    client.update.mockResolvedValue({ Attributes: aliceItem, $metadata: {} });
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    await users.updateOne({ passwordResetToken: 'tok' }, { $set: { passwordResetToken: null } });

    expect(client.query).toHaveBeenCalledWith(expect.objectContaining({ IndexName: 'reset-token-index' }));
    expect(client.update).toHaveBeenCalledWith(
      expect.objectContaining({
        Key: { username: 'alice' },
        UpdateExpression: 'REMOVE #passwordResetToken',
        ConditionExpression: 'attribute_exists(#username) AND #passwordResetToken = :v0',
      }),
    );
  });

  it('skips the update entirely when nothing matches', async () => {
    const client = fakeClient();
    client.query.mockResolvedValue({ Items: [], $metadata: {} });
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    await expect(users.updateOne({ email: 'nobody@x.com' }, { $set: { status: 'inactive' } })).resolves.toBeNull();
    expect(client.update).not.toHaveBeenCalled();
  });

  it('counts only the deletes whose condition still held', async () => {
    const client = fakeClient();
    client.scan.mockResolvedValue({ Items: [sessionItem('s1'), sessionItem('s2')], $metadata: {} });
    client.delete.mockResolvedValueOnce({ $metadata: {} }).mockRejectedValueOnce(conditionalFailure());
    const sessions = new DynamoCollection(client, 'sessions-table', sessionsCollection);

    await expect(sessions.deleteMany({ expiresAt: { $lte: '2024-01-02T00:00:00.000Z' } })).resolves.toBe(1);
    expect(client.delete).toHaveBeenNthCalledWith(1, {
      TableName: 'sessions-table',
      Key: { sessionId: 's1' },
      ConditionExpression: '#expiresAt <= :v0',
      ExpressionAttributeNames: { '#expiresAt': 'expiresAt' },
      ExpressionAttributeValues: { ':v0': '2024-01-02T00:00:00.000Z' },
    });
  });

  it('wraps service failures in StorageError', async () => {
    const client = fakeClient();
    client.get.mockRejectedValue(new Error('socket hang up'));
    const users = new DynamoCollection(client, 'users-table', usersCollection);

    const err = await users.findOne({ username: 'alice' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toHaveProperty('message', 'findOne on users-table failed: socket hang up');
  });
});
