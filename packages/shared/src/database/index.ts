import { DataSource, DataSourceOptions, EntitySchema } from 'typeorm';

export type EntityTarget = Function | string | EntitySchema;

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  entities: EntityTarget[];
  synchronize?: boolean;
  logging?: boolean;
}

export const buildDataSourceOptions = (config: DatabaseConfig): DataSourceOptions => ({
  type: 'postgres',
  host: config.host,
  port: config.port,
  username: config.username,
  password: config.password,
  database: config.database,
  entities: [...config.entities],
  synchronize: config.synchronize || false,
  logging: config.logging || false,
});

export const createDataSource = (config: DatabaseConfig): DataSource =>
  new DataSource(buildDataSourceOptions(config));

export { DataSource };
