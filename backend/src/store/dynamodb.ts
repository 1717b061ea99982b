import { DynamoDBClient, DescribeTableCommand } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  DeleteCommand,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
  UpdateCommand,
  type DeleteCommandInput,
  type DeleteCommandOutput,
  type GetCommandInput,
  type GetCommandOutput,
  type PutCommandInput,
  type PutCommandOutput,
  type QueryCommandInput,
  type QueryCommandOutput,
  type ScanCommandInput,
  type ScanCommandOutput,
  type UpdateCommandInput,
  type UpdateCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import type { TableNames } from '../config.js';
import {
  attendanceCollection,
  linksCollection,
  sessionsCollection,
  studentsCollection,
  usersCollection,
} from './collections.js';
import { DuplicateKeyError, StorageError, describeError } from './errors.js';
import { ExpressionBuilder, joinConditions } from './expressions.js';
import { fieldsOf, isComparison, matchesFilter } from './filter.js';
import type { CollectionDefinition, DocumentCollection, Filter, Store, Update } from './types.js';

type Key = Record<string, unknown>;

function isConditionalFailure(err: unknown): boolean {
  return err instanceof Error && err.name === 'ConditionalCheckFailedException';
}

// Null fields are left off the item; the collection schema restores them on read.
function toItem(doc: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(doc).filter(([, value]) => value !== null));
}

// The six DocumentClient commands the adapter issues.
export interface TableClient {
  get(input: GetCommandInput): Promise<GetCommandOutput>;
  put(input: PutCommandInput): Promise<PutCommandOutput>;
  update(input: UpdateCommandInput): Promise<UpdateCommandOutput>;
  delete(input: DeleteCommandInput): Promise<DeleteCommandOutput>;
  query(input: QueryCommandInput): Promise<QueryCommandOutput>;
  scan(input: ScanCommandInput): Promise<ScanCommandOutput>;
}

export function createTableClient(region: string): TableClient {
  const docClient = DynamoDBDocumentClient.from(new DynamoDBClient({ region }), {
    marshallOptions: { removeUndefinedValues: true },
  });
  return {
    get: (input) => docClient.send(new GetCommand(input)),
    put: (input) => docClient.send(new PutCommand(input)),
    update: (input) => docClient.send(new UpdateCommand(input)),
    delete: (input) => docClient.send(new DeleteCommand(input)),
    query: (input) => docClient.send(new QueryCommand(input)),
    scan: (input) => docClient.send(new ScanCommand(input)),
  };
}

export class DynamoCollection<T extends object> implements DocumentCollection<T> {
  constructor(
    private readonly client: TableClient,
    private readonly tableName: string,
    private readonly definition: CollectionDefinition<T>,
  ) {}

  get name(): string {
    return this.definition.name;
  }

  async findOne(filter: Filter<T>): Promise<T | null> {
    return this.run('findOne', async () => {
      const key = this.keyFromFilter(filter);
      if (key) {
        const result = await this.client.get({ TableName: this.tableName, Key: key, ConsistentRead: true });
        if (!result.Item) return null;
        const doc = this.definition.schema.parse(result.Item);
        return matchesFilter(doc, filter) ? doc : null;
      }
      const [first] = await this.collect(filter);
      return first ?? null;
    });
  }

  async find(filter: Filter<T> = {}): Promise<T[]> {
    return this.run('find', () => this.collect(filter));
  }

  async insertOne(doc: T): Promise<void> {
    return this.run('insertOne', async () => {
      const builder = new ExpressionBuilder();
      try {
        await this.client.put({
          TableName: this.tableName,
          Item: toItem(doc),
          ConditionExpression: `attribute_not_exists(${builder.name(this.definition.partitionKey)})`,
          ExpressionAttributeNames: builder.attributeNames(),
        });
      } catch (err) {
        if (isConditionalFailure(err)) throw new DuplicateKeyError(this.name, this.keyFields());
        throw err;
      }
    });
  }

  async updateOne(filter: Filter<T>, update: Update<T>): Promise<T | null> {
    return this.run('updateOne', async () => {
      let key = this.keyFromFilter(filter);
      if (!key) {
        const current = await this.collect(filter);
        if (current.length === 0) return null;
        key = this.keyOf(current[0]);
      }

      const builder = new ExpressionBuilder();
      const updateExpression = builder.update(update);
      if (!updateExpression) return this.findOne(filter);
      const condition = joinConditions(
        `attribute_exists(${builder.name(this.definition.partitionKey)})`,
        builder.condition(filter),
      );

      try {
        const result = await this.client.update({
          TableName: this.tableName,
          Key: key,
          UpdateExpression: updateExpression,
          ConditionExpression: condition,
          ExpressionAttributeNames: builder.attributeNames(),
          ExpressionAttributeValues: builder.attributeValues(),
          ReturnValues: 'ALL_NEW',
        });
        return result.Attributes ? this.definition.schema.parse(result.Attributes) : null;
      } catch (err) {
        if (isConditionalFailure(err)) return null;
        throw err;
      }
    });
  }

  async deleteMany(filter: Filter<T>): Promise<number> {
    return this.run('deleteMany', async () => {
      const matches = await this.collect(filter);
      let deleted = 0;
      for (const doc of matches) {
        const builder = new ExpressionBuilder();
        try {
          await this.client.delete({
            TableName: this.tableName,
            Key: this.keyOf(doc),
            ConditionExpression: builder.condition(filter),
            ExpressionAttributeNames: builder.attributeNames(),
            ExpressionAttributeValues: builder.attributeValues(),
          });
          deleted++;
        } catch (err) {
          // Changed or removed since the read; someone else got there first.
          if (!isConditionalFailure(err)) throw err;
        }
      }
      return deleted;
    });
  }

  async countDocuments(filter: Filter<T> = {}): Promise<number> {
    return this.run('countDocuments', async () => (await this.collect(filter)).length);
  }

  private keyFields(): string[] {
    const { partitionKey, sortKey } = this.definition;
    return sortKey ? [partitionKey, sortKey] : [partitionKey];
  }

  private keyOf(doc: T): Key {
    const fields = fieldsOf(doc);
    return Object.fromEntries(this.keyFields().map((field) => [field, fields.get(field)]));
  }

  // The table key when the filter pins every key attribute to a plain value.
  private keyFromFilter(filter: Filter<T>): Key | null {
    const fields = fieldsOf(filter);
    const key: Key = {};
    for (const field of this.keyFields()) {
      const value = fields.get(field);
      if (value === undefined || value === null || isComparison(value)) return null;
      key[field] = value;
    }
    return key;
  }

  private equalityField(filter: Filter<T>): { field: string; value: unknown; indexName?: string } | null {
    const fields = fieldsOf(filter);
    const partition = fields.get(this.definition.partitionKey);
    if (partition !== undefined && partition !== null && !isComparison(partition)) {
      return { field: this.definition.partitionKey, value: partition };
    }
    for (const [field, indexName] of Object.entries(this.definition.indexes)) {
      const value = fields.get(field);
      if (typeof indexName === 'string' && value !== undefined && value !== null && !isComparison(value)) {
        return { field, value, indexName };
      }
    }
    return null;
  }

  // Query when the filter pins the partition key or an indexed field, scan otherwise.
  private async collect(filter: Filter<T>): Promise<T[]> {
    const docs: T[] = [];
    const pinned = this.equalityField(filter);
    let exclusiveStartKey: Key | undefined;

    do {
      const builder = new ExpressionBuilder();
      let page: { Items?: Record<string, unknown>[]; LastEvaluatedKey?: Key };
      if (pinned) {
        const keyCondition = `${builder.name(pinned.field)} = ${builder.value(pinned.value)}`;
        const filterExpression = builder.condition(filter, [pinned.field]);
        page = await this.client.query({
          TableName: this.tableName,
          IndexName: pinned.indexName,
          KeyConditionExpression: keyCondition,
          FilterExpression: filterExpression,
          ExpressionAttributeNames: builder.attributeNames(),
          ExpressionAttributeValues: builder.attributeValues(),
          ExclusiveStartKey: exclusiveStartKey,
        });
      } else {
        const filterExpression = builder.condition(filter);
        page = await this.client.scan({
          TableName: this.tableName,
          FilterExpression: filterExpression,
          ExpressionAttributeNames: builder.attributeNames(),
          ExpressionAttributeValues: builder.attributeValues(),
          ExclusiveStartKey: exclusiveStartKey,
        });
      }
      for (const item of page.Items ?? []) {
        docs.push(this.definition.schema.parse(item));
      }
      exclusiveStartKey = page.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return docs;
  }

  private async run<R>(operation: string, task: () => Promise<R>): Promise<R> {
    try {
      return await task();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`${operation} on ${this.tableName} failed: ${describeError(err)}`, { cause: err });
    }
  }
}

export function createDynamoStore(client: TableClient, tables: TableNames): Store {
  return {
    backend: 'dynamodb',
    users: new DynamoCollection(client, tables.users, usersCollection),
    attendance: new DynamoCollection(client, tables.attendance, attendanceCollection),
    sessions: new DynamoCollection(client, tables.sessions, sessionsCollection),
    links: new DynamoCollection(client, tables.links, linksCollection),
    students: new DynamoCollection(client, tables.students, studentsCollection),
  };
}

// Capability probe run once at startup: can we see the users table?
export async function probeDynamo(region: string, tableName: string): Promise<boolean> {
  const client = new DynamoDBClient({ region });
  try {
    await client.send(new DescribeTableCommand({ TableName: tableName }));
    return true;
  } catch (err) {
    console.info(`DynamoDB probe for ${tableName} failed: ${describeError(err)}`);
    return false;
  } finally {
    client.destroy();
  }
}
