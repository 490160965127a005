import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { booleanFromEnv, validateConfig } from './validate-config';

const DatabaseEnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('restaurantes.db'),
  DROP_SCHEMA_ON_STARTUP: booleanFromEnv.default('false'),
});

export type DatabaseConfig = {
  path: string;
  dropSchema: boolean;
};

export default registerAs<DatabaseConfig>('database', () => {
  const env = validateConfig(DatabaseEnvSchema, process.env);

  return {
    path: env.DATABASE_PATH,
    dropSchema: env.DROP_SCHEMA_ON_STARTUP,
  };
});
