import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { SpendCounterCorruptError } from '@enrich/core';
import type { SpendStore } from '@enrich/core';

export interface DynamoSpendStoreOptions {
  tableName: string;
  counterKey: string;
  client?: DynamoDBDocumentClient;
}

/**
 * Spend counter kept in one DynamoDB item. Increments are applied atomically
 * by the update expression, so overlapping batch processes never lose each
 * other's spend and each write returns the shared running total.
 */
export class DynamoSpendStore implements SpendStore {
  private readonly tableName: string;
  private readonly counterKey: string;
  private readonly client: DynamoDBDocumentClient;

  constructor(options: DynamoSpendStoreOptions) {
    if (!options.tableName) {
      throw new Error('SPEND_TABLE_NAME must be provided for DynamoSpendStore');
    }
    if (!options.counterKey) {
      throw new Error('SPEND_COUNTER_KEY must be provided for DynamoSpendStore');
    }
    this.tableName = options.tableName;
    this.counterKey = options.counterKey;
    this.client = options.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}));
  }

  get location(): string {
    return `dynamodb://${this.tableName}/${this.counterKey}`;
  }

  async read(): Promise<number | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: this.key(),
        ConsistentRead: true
      })
    );

    if (!result.Item) {
      return null;
    }
    return this.parseTotal(result.Item.used);
  }

  async write(_used: number, delta: number): Promise<number> {
    const result = await this.client.send(
      new UpdateCommand({
        TableName: this.tableName,
        Key: this.key(),
        UpdateExpression: 'SET #used = if_not_exists(#used, :zero) + :delta, #updatedAt = :now',
        ExpressionAttributeNames: {
          '#used': 'used',
          '#updatedAt': 'updatedAt'
        },
        ExpressionAttributeValues: {
          ':zero': 0,
          ':delta': delta,
          ':now': new Date().toISOString()
        },
        ReturnValues: 'UPDATED_NEW'
      })
    );

    return this.parseTotal(result.Attributes?.used);
  }

  private key(): Record<string, string> {
    return {
      pk: `SPEND#${this.counterKey.toUpperCase()}`,
      sk: 'TOTAL'
    };
  }

  private parseTotal(value: unknown): number {
    if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
      return value;
    }
    throw new SpendCounterCorruptError(this.location, String(value));
  }
}
