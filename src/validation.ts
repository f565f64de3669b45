import {
  AddExpenseInput,
  DateRangeInput,
  DeleteExpensesInput,
  SummarizeInput,
  UpdateExpensesInput,
  ValidationResult
} from './types';

type Body = Record<string, unknown>;

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

function isObject(input: unknown): input is Body {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

export function isValidDate(value: string): boolean {
  if (!DATE_REGEX.test(value)) return false;

  const [year, month, day] = value.split('-').map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

function checkDate(data: Body, field: string, required: boolean, errors: string[]): void {
  const value = data[field];
  if (isAbsent(value)) {
    if (required) errors.push(`${field} is required`);
  } else if (typeof value !== 'string') {
    errors.push(`${field} must be a string`);
  } else if (!DATE_REGEX.test(value.trim())) {
    errors.push(`${field} must be in YYYY-MM-DD format`);
  } else if (!isValidDate(value.trim())) {
    errors.push(`${field} is not a valid date`);
  }
}

function checkAmount(data: Body, field: string, required: boolean, errors: string[]): void {
  const value = data[field];
  if (isAbsent(value)) {
    if (required) errors.push(`${field} is required`);
  } else if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${field} must be a valid number`);
  }
}

function checkText(data: Body, field: string, errors: string[]): void {
  const value = data[field];
  if (!isAbsent(value) && typeof value !== 'string') {
    errors.push(`${field} must be a string`);
  } else if (typeof value === 'string' && value.length > 500) {
    errors.push(`${field} must be 500 characters or less`);
  }
}

function checkExpenseId(data: Body, errors: string[]): void {
  const value = data.expense_id;
  if (!isAbsent(value) && (typeof value !== 'number' || !Number.isInteger(value) || value <= 0)) {
    errors.push('expense_id must be a positive integer');
  }
}

function checkDryRun(data: Body, errors: string[]): void {
  const value = data.dry_run;
  if (!isAbsent(value) && typeof value !== 'boolean') {
    errors.push('dry_run must be a boolean');
  }
}

function result(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

const NOT_AN_OBJECT: ValidationResult = {
  valid: false,
  errors: ['Arguments must be a valid JSON object']
};

export function validateAddExpenseInput(input: unknown): ValidationResult {
  if (!isObject(input)) return NOT_AN_OBJECT;
  const errors: string[] = [];

  checkDate(input, 'date', true, errors);
  checkAmount(input, 'amount', true, errors);

  if (isAbsent(input.category)) {
    errors.push('category is required');
  } else if (typeof input.category !== 'string') {
    errors.push('category must be a string');
  } else if (input.category.trim().length === 0) {
    errors.push('category cannot be empty');
  }

  checkText(input, 'subcategory', errors);
  checkText(input, 'note', errors);

  return result(errors);
}

export function validateDateRangeInput(input: unknown): ValidationResult {
  if (!isObject(input)) return NOT_AN_OBJECT;
  const errors: string[] = [];

  checkDate(input, 'start_date', true, errors);
  checkDate(input, 'end_date', true, errors);

  return result(errors);
}

export function validateSummarizeInput(input: unknown): ValidationResult {
  const range = validateDateRangeInput(input);
  if (!isObject(input)) return range;

  const errors = [...range.errors];
  checkText(input, 'category', errors);
  return result(errors);
}

export function validateDeleteExpensesInput(input: unknown): ValidationResult {
  if (!isObject(input)) return NOT_AN_OBJECT;
  const errors: string[] = [];

  checkExpenseId(input, errors);
  checkDate(input, 'date', false, errors);
  checkDate(input, 'start_date', false, errors);
  checkDate(input, 'end_date', false, errors);
  checkText(input, 'category', errors);
  checkText(input, 'subcategory', errors);
  checkDryRun(input, errors);

  return result(errors);
}

export function validateUpdateExpensesInput(input: unknown): ValidationResult {
  if (!isObject(input)) return NOT_AN_OBJECT;
  const errors: string[] = [];

  checkExpenseId(input, errors);
  checkDate(input, 'start_date', false, errors);
  checkDate(input, 'end_date', false, errors);
  checkDate(input, 'filter_date', false, errors);
  checkText(input, 'filter_category', errors);
  checkText(input, 'filter_subcategory', errors);
  checkDate(input, 'new_date', false, errors);
  checkAmount(input, 'new_amount', false, errors);
  checkText(input, 'new_category', errors);
  checkText(input, 'new_subcategory', errors);
  checkText(input, 'new_note', errors);
  checkDryRun(input, errors);

  return result(errors);
}

// Sanitizers trim text and leave absent values absent

function trimOptional(value: string | null | undefined): string | undefined {
  return isAbsent(value) ? undefined : value.trim();
}

export function sanitizeAddExpenseInput(input: AddExpenseInput): Required<AddExpenseInput> {
  return {
    date: input.date.trim(),
    amount: input.amount,
    category: input.category.trim(),
    subcategory: input.subcategory?.trim() ?? '',
    note: input.note?.trim() ?? ''
  };
}

export function sanitizeDateRangeInput<T extends DateRangeInput>(input: T): T {
  return { ...input, start_date: input.start_date.trim(), end_date: input.end_date.trim() };
}

export function sanitizeSummarizeInput(input: SummarizeInput): SummarizeInput {
  return { ...sanitizeDateRangeInput(input), category: trimOptional(input.category) };
}

export function sanitizeDeleteExpensesInput(input: DeleteExpensesInput): DeleteExpensesInput {
  return {
    expense_id: input.expense_id ?? undefined,
    date: trimOptional(input.date),
    start_date: trimOptional(input.start_date),
    end_date: trimOptional(input.end_date),
    category: trimOptional(input.category),
    subcategory: trimOptional(input.subcategory),
    dry_run: input.dry_run ?? false
  };
}

export function sanitizeUpdateExpensesInput(input: UpdateExpensesInput): UpdateExpensesInput {
  return {
    expense_id: input.expense_id ?? undefined,
    start_date: trimOptional(input.start_date),
    end_date: trimOptional(input.end_date),
    filter_date: trimOptional(input.filter_date),
    filter_category: trimOptional(input.filter_category),
    filter_subcategory: trimOptional(input.filter_subcategory),
    new_date: trimOptional(input.new_date),
    new_amount: input.new_amount ?? undefined,
    new_category: trimOptional(input.new_category),
    new_subcategory: trimOptional(input.new_subcategory),
    new_note: trimOptional(input.new_note),
    dry_run: input.dry_run ?? false
  };
}
