// Clients
export { SsmClient, DynamoDBClient, makeClients } from "./clients";
export type { SsmApi, DynamoDBApi, ClientsConfig } from "./clients";

// SSM
export { verifyCredentials, putParameter } from "./ssm";
export type { PutParameterInput } from "./ssm";

// DynamoDB
export { ensureTableExists, putItem } from "./dynamodb";
