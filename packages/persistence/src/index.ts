export * from './FileSpendStore';
export * from './DynamoSpendStore';
