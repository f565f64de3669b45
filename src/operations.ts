import { ExpenseStore } from './database';
import { buildSet, buildWhere } from './queryBuilder';
import {
  AddExpenseInput,
  AddExpenseResult,
  CreditExpenseResult,
  DateRangeInput,
  DeleteExpensesInput,
  DeleteExpensesResult,
  ErrorResult,
  ListExpensesResult,
  SummarizeInput,
  SummarizeResult,
  UpdateExpensesInput,
  UpdateExpensesResult
} from './types';

function storageFailure(action: string, error: unknown): ErrorResult {
  console.error(`Error ${action}:`, error);
  const message = error instanceof Error ? error.message : String(error);
  return { status: 'error', message };
}

export type ExpenseOperations = ReturnType<typeof createOperations>;

export function createOperations(store: ExpenseStore) {
  return {
    addExpense(input: AddExpenseInput): AddExpenseResult {
      try {
        const id = store.insert({
          date: input.date,
          amount: input.amount,
          category: input.category,
          subcategory: input.subcategory ?? '',
          note: input.note ?? ''
        });
        console.log(`Added expense: ${id}`);
        return { status: 'ok', id };
      } catch (error) {
        return storageFailure('adding expense', error);
      }
    },

    creditExpense(input: AddExpenseInput): CreditExpenseResult {
      const credited = -Math.abs(input.amount);
      try {
        const id = store.insert({
          date: input.date,
          amount: credited,
          category: input.category,
          subcategory: input.subcategory ?? '',
          note: input.note ?? ''
        });
        console.log(`Credited expense: ${id} (${credited})`);
        return { status: 'ok', id, credited };
      } catch (error) {
        return storageFailure('crediting expense', error);
      }
    },

    listExpenses(input: DateRangeInput): ListExpensesResult {
      try {
        return { status: 'ok', expenses: store.listByDateRange(input.start_date, input.end_date) };
      } catch (error) {
        return storageFailure('listing expenses', error);
      }
    },

    summarize(input: SummarizeInput): SummarizeResult {
      try {
        const summary = store.summarizeByCategory(
          input.start_date,
          input.end_date,
          input.category ?? undefined
        );
        return { status: 'ok', summary };
      } catch (error) {
        return storageFailure('summarizing expenses', error);
      }
    },

    deleteExpenses(input: DeleteExpensesInput): DeleteExpensesResult {
      const where = buildWhere(
        {
          id: input.expense_id,
          date: input.date,
          startDate: input.start_date,
          endDate: input.end_date,
          category: input.category,
          subcategory: input.subcategory
        },
        'delete'
      );
      if (!where.ok) return { status: 'error', message: where.error };

      try {
        if (input.dry_run) {
          return { status: 'dry_run', rows: store.findWhere(where.clause) };
        }
        const deleted = store.deleteWhere(where.clause);
        console.log(`Deleted ${deleted} expense(s)`);
        return { status: 'ok', deleted };
      } catch (error) {
        return storageFailure('deleting expenses', error);
      }
    },

    updateExpenses(input: UpdateExpensesInput): UpdateExpensesResult {
      const set = buildSet({
        date: input.new_date,
        amount: input.new_amount,
        category: input.new_category,
        subcategory: input.new_subcategory,
        note: input.new_note
      });
      if (!set.ok) return { status: 'error', message: set.error };

      const where = buildWhere(
        {
          id: input.expense_id,
          date: input.filter_date,
          startDate: input.start_date,
          endDate: input.end_date,
          category: input.filter_category,
          subcategory: input.filter_subcategory
        },
        'update'
      );
      if (!where.ok) return { status: 'error', message: where.error };

      try {
        if (input.dry_run) {
          return { status: 'dry_run', rows: store.findWhere(where.clause) };
        }
        const updated = store.updateWhere(set.clause, where.clause);
        console.log(`Updated ${updated} expense(s)`);
        return { status: 'ok', updated };
      } catch (error) {
        return storageFailure('updating expenses', error);
      }
    }
  };
}
