export type DbDriver = 'postgres' | 'memory';

export interface WarehouseConfig {
  // HTTP
  readonly PORT: number;
  readonly BACKEND_TIMEOUT_MS: number;

  // Service identity
  readonly SERVICE_VERSION: string;
  readonly ENVIRONMENT: string;

  // Logging
  readonly LOG_LEVEL: string;

  // Store
  readonly DB_DRIVER: DbDriver;
  readonly DB_HOST: string;
  readonly DB_PORT: number;
  readonly DB_USER: string;
  readonly DB_PASSWORD: string;
  readonly DB_NAME: string;
  readonly DB_POOL_MAX: number;
  readonly DB_CONNECT_TIMEOUT_MS: number;
  readonly DB_MIGRATE: boolean;
}
