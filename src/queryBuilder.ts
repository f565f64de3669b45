export type SqlValue = string | number;

export interface Clause {
  sql: string;
  params: SqlValue[];
}

export type ClauseResult =
  | { ok: true; clause: Clause }
  | { ok: false; error: string };

export interface ExpenseFilters {
  id?: number | null;
  date?: string | null;
  startDate?: string | null;
  endDate?: string | null;
  category?: string | null;
  subcategory?: string | null;
}

export interface ExpenseChanges {
  date?: string | null;
  amount?: number | null;
  category?: string | null;
  subcategory?: string | null;
  note?: string | null;
}

export const NO_UPDATE_VALUES_MESSAGE = 'No new values provided to update.';

export function noFiltersMessage(action: 'delete' | 'update'): string {
  return `No filters provided. Refusing to ${action} all records.`;
}

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== undefined && value !== null;
}

/**
 * Collects SQL fragments together with the values they bind, so the
 * rendered text and the parameter vector can never drift apart.
 */
export class ClauseBuilder {
  private parts: Clause[] = [];

  add(sql: string, ...params: SqlValue[]): this {
    this.parts.push({ sql, params });
    return this;
  }

  addIfPresent(sql: string, value: SqlValue | null | undefined): this {
    if (isPresent(value)) this.add(sql, value);
    return this;
  }

  get size(): number {
    return this.parts.length;
  }

  render(separator: string): Clause {
    return {
      sql: this.parts.map(p => p.sql).join(separator),
      params: this.parts.flatMap(p => p.params)
    };
  }
}

export function buildWhere(filters: ExpenseFilters, action: 'delete' | 'update'): ClauseResult {
  const builder = new ClauseBuilder()
    .addIfPresent('id = ?', filters.id)
    .addIfPresent('date = ?', filters.date);

  // A range needs both bounds; a lone bound does not filter anything
  if (isPresent(filters.startDate) && isPresent(filters.endDate)) {
    builder.add('date BETWEEN ? AND ?', filters.startDate, filters.endDate);
  }

  builder
    .addIfPresent('category = ?', filters.category)
    .addIfPresent('subcategory = ?', filters.subcategory);

  if (builder.size === 0) {
    return { ok: false, error: noFiltersMessage(action) };
  }

  return { ok: true, clause: builder.render(' AND ') };
}

export function buildSet(changes: ExpenseChanges): ClauseResult {
  const builder = new ClauseBuilder()
    .addIfPresent('date = ?', changes.date)
    .addIfPresent('amount = ?', changes.amount)
    .addIfPresent('category = ?', changes.category)
    .addIfPresent('subcategory = ?', changes.subcategory)
    .addIfPresent('note = ?', changes.note);

  if (builder.size === 0) {
    return { ok: false, error: NO_UPDATE_VALUES_MESSAGE };
  }

  return { ok: true, clause: builder.render(', ') };
}
