import path from 'path';

export interface AppConfig {
  port: number;
  host: string;
  databasePath: string;
  categoriesPath: string;
}

const DEFAULT_PORT = 3001;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInt(env.PORT ?? '', 10);

  return {
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
    host: env.HOST || '0.0.0.0',
    databasePath: path.resolve(env.DB_PATH || 'expenses.db'),
    categoriesPath: path.resolve(env.CATEGORIES_PATH || 'categories.json')
  };
}
