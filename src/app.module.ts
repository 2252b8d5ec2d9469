import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { AiModule } from './ai/ai.module';
import databaseConfig from './config/database.config';
import qdrantConfig from './config/qdrant.config';
import assistantConfig from './config/assistant.config';

@Module({
  imports: [
    // Global config
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, qdrantConfig, assistantConfig],
      envFilePath: '.env',
    }),

    // Query log storage
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService): TypeOrmModuleOptions =>
        config.getOrThrow<TypeOrmModuleOptions>('database'),
    }),

    AiModule,
  ],
})
export class AppModule {}
