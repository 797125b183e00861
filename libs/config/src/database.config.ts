import { registerAs } from '@nestjs/config';

export const databaseConfig = registerAs('database', () => ({
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432', 10),
  username: process.env.DATABASE_USER || 'weatherscape',
  password: process.env.DATABASE_PASSWORD || 'weatherscape',
  database: process.env.DATABASE_NAME || 'weatherscape',
}));
