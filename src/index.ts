import 'dotenv/config';
import { Server } from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { ExpenseStore } from './database';
import { createOperations } from './operations';

const config = loadConfig();
const store = new ExpenseStore({ databasePath: config.databasePath });

let server: Server | null = null;

function shutdown(): void {
  console.log('\nShutting down gracefully...');
  if (!server) process.exit(0);
  server.close(error => {
    if (error) {
      console.error('Error closing server:', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Initialize database and start server
function start(): void {
  try {
    store.init();
  } catch (error) {
    console.error('Failed to initialize database:', error);
    process.exit(1);
  }

  const app = createApp({
    operations: createOperations(store),
    categoriesPath: config.categoriesPath
  });

  server = app.listen(config.port, config.host, () => {
    console.log(`Expense Ledger API running on http://${config.host}:${config.port}`);
    console.log(`Database: ${config.databasePath}`);
    console.log('Available endpoints:');
    console.log('  GET    /tools                 - List callable procedures');
    console.log('  POST   /tools/:name           - Invoke add_expense, credit_expense, list_expenses,');
    console.log('                                  summarize, delete_expenses or update_expenses');
    console.log('  GET    /resources/categories  - Category list');
    console.log('  GET    /health                - Health check');
  });
}

start();
