import { BetterSqlite3Driver, SQLiteDriver } from './driver';
import { Clause } from './queryBuilder';
import { CategorySummary, Expense, NewExpense } from './types';

const EXPENSE_COLUMNS = 'id, date, amount, category, subcategory, note';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    amount REAL NOT NULL,
    category TEXT NOT NULL,
    subcategory TEXT DEFAULT '',
    note TEXT DEFAULT ''
  )
`;

export interface ExpenseStoreOptions {
  databasePath: string;
  openDriver?: (filename: string) => SQLiteDriver;
}

/**
 * Expense table access. Every call opens its own connection and closes it
 * on the way out, whether the statement succeeded or threw.
 */
export class ExpenseStore {
  private readonly databasePath: string;
  private readonly openDriver: (filename: string) => SQLiteDriver;

  constructor(options: ExpenseStoreOptions) {
    this.databasePath = options.databasePath;
    this.openDriver = options.openDriver ?? (filename => new BetterSqlite3Driver(filename));
  }

  withConnection<T>(fn: (driver: SQLiteDriver) => T): T {
    const driver = this.openDriver(this.databasePath);
    try {
      return fn(driver);
    } finally {
      driver.close();
    }
  }

  init(): void {
    this.withConnection(driver => {
      // WAL is persistent on the file, so setting it once here covers later connections
      driver.pragma('journal_mode = WAL');
      driver.exec(SCHEMA);
    });
  }

  insert(expense: NewExpense): number {
    return this.withConnection(driver => {
      const result = driver.run(
        'INSERT INTO expenses (date, amount, category, subcategory, note) VALUES (?, ?, ?, ?, ?)',
        [expense.date, expense.amount, expense.category, expense.subcategory, expense.note]
      );
      return result.lastInsertRowid;
    });
  }

  listByDateRange(startDate: string, endDate: string): Expense[] {
    return this.withConnection(driver =>
      driver.all<Expense>(
        `SELECT ${EXPENSE_COLUMNS} FROM expenses WHERE date BETWEEN ? AND ? ORDER BY id ASC`,
        [startDate, endDate]
      )
    );
  }

  summarizeByCategory(startDate: string, endDate: string, category?: string): CategorySummary[] {
    let sql = `
      SELECT category, SUM(amount) AS total_amount, COUNT(*) AS count
      FROM expenses
      WHERE date BETWEEN ? AND ?`;
    const params: string[] = [startDate, endDate];

    if (category) {
      sql += ' AND category = ?';
      params.push(category);
    }

    sql += ' GROUP BY category ORDER BY category ASC';

    return this.withConnection(driver => driver.all<CategorySummary>(sql, params));
  }

  findWhere(where: Clause): Expense[] {
    return this.withConnection(driver =>
      driver.all<Expense>(
        `SELECT ${EXPENSE_COLUMNS} FROM expenses WHERE ${where.sql} ORDER BY id ASC`,
        where.params
      )
    );
  }

  deleteWhere(where: Clause): number {
    return this.withConnection(driver =>
      driver.run(`DELETE FROM expenses WHERE ${where.sql}`, where.params).changes
    );
  }

  updateWhere(set: Clause, where: Clause): number {
    return this.withConnection(driver =>
      driver.run(
        `UPDATE expenses SET ${set.sql} WHERE ${where.sql}`,
        [...set.params, ...where.params]
      ).changes
    );
  }

  count(): number {
    return this.withConnection(driver => {
      const row = driver.get<{ total: number }>('SELECT COUNT(*) AS total FROM expenses');
      return row?.total ?? 0;
    });
  }
}
