import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const database = this.configService.getOrThrow('database', {
      infer: true,
    });
    const nodeEnv = this.configService.getOrThrow('app.nodeEnv', {
      infer: true,
    });

    return {
      type: 'better-sqlite3',
      database: database.path,
      synchronize: true,
      dropSchema: database.dropSchema,
      // Entities register themselves through TypeOrmModule.forFeature
      autoLoadEntities: true,
      logging: nodeEnv === 'development',
    };
  }
}
