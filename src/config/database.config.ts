import { registerAs } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { QueryLog } from '../query-log/query-log.entity';

export default registerAs(
  'database',
  (): TypeOrmModuleOptions => ({
    type: 'mysql',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    username: process.env.DB_USERNAME || 'root',
    password: process.env.DB_PASSWORD || '',
    database: process.env.DB_NAME || 'portfolio_assistant',
    entities: [QueryLog],
    synchronize: process.env.NODE_ENV !== 'production', // Auto-sync in dev only
    logging: process.env.NODE_ENV === 'development',
  }),
);
