import { DynamoDB } from 'aws-sdk';

/**
 * DocumentClient options, taken from the environment.
 * DYNAMODB_ENDPOINT points the client at a local DynamoDB.
 */
const documentClientOptions: DynamoDB.DocumentClient.DocumentClientOptions & DynamoDB.Types.ClientConfiguration = {
  region: process.env.AWS_REGION || 'us-east-1',
  convertEmptyValues: true,
  ...(process.env.DYNAMODB_ENDPOINT && {
    endpoint: process.env.DYNAMODB_ENDPOINT
  })
};

export const documentClient = new DynamoDB.DocumentClient(documentClientOptions);
