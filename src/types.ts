// Expense types
export interface Expense {
  id: number;
  date: string; // ISO date string (YYYY-MM-DD)
  amount: number; // Positive for spend, negative for credit
  category: string;
  subcategory: string;
  note: string;
}

export type NewExpense = Omit<Expense, 'id'>;

export interface AddExpenseInput {
  date: string;
  amount: number;
  category: string;
  subcategory?: string;
  note?: string;
}

export interface DateRangeInput {
  start_date: string;
  end_date: string;
}

export interface SummarizeInput extends DateRangeInput {
  category?: string | null;
}

// Optional fields: undefined or null means "not provided"; '' is a real value
export interface DeleteExpensesInput {
  expense_id?: number | null;
  date?: string | null;
  start_date?: string | null;
  end_date?: string | null;
  category?: string | null;
  subcategory?: string | null;
  dry_run?: boolean | null;
}

export interface UpdateExpensesInput {
  expense_id?: number | null;
  start_date?: string | null;
  end_date?: string | null;
  filter_date?: string | null;
  filter_category?: string | null;
  filter_subcategory?: string | null;
  new_date?: string | null;
  new_amount?: number | null;
  new_category?: string | null;
  new_subcategory?: string | null;
  new_note?: string | null;
  dry_run?: boolean | null;
}

export interface CategorySummary {
  category: string;
  total_amount: number;
  count: number;
}

// Result envelopes
export interface ErrorResult {
  status: 'error';
  message: string;
  details?: string[];
}

export interface DryRunResult {
  status: 'dry_run';
  rows: Expense[];
}

export type OperationResult<T extends object> = ({ status: 'ok' } & T) | ErrorResult;

export type AddExpenseResult = OperationResult<{ id: number }>;
export type CreditExpenseResult = OperationResult<{ id: number; credited: number }>;
export type ListExpensesResult = OperationResult<{ expenses: Expense[] }>;
export type SummarizeResult = OperationResult<{ summary: CategorySummary[] }>;
export type DeleteExpensesResult = OperationResult<{ deleted: number }> | DryRunResult;
export type UpdateExpensesResult = OperationResult<{ updated: number }> | DryRunResult;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
