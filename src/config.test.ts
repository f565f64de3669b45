import path from 'path';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      host: '0.0.0.0',
      databasePath: path.resolve('expenses.db'),
      categoriesPath: path.resolve('categories.json')
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '8000',
      HOST: '127.0.0.1',
      DB_PATH: '/var/lib/ledger/expenses.db',
      CATEGORIES_PATH: '/etc/ledger/categories.json'
    });

    expect(config).toEqual({
      port: 8000,
      host: '127.0.0.1',
      databasePath: '/var/lib/ledger/expenses.db',
      categoriesPath: '/etc/ledger/categories.json'
    });
  });

  it('should ignore an invalid port', () => {
    expect(loadConfig({ PORT: 'abc' }).port).toBe(3001);
  });
});
