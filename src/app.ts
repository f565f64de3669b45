import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { getCategories } from './categories';
import { ExpenseOperations } from './operations';
import {
  validateAddExpenseInput,
  validateDateRangeInput,
  validateSummarizeInput,
  validateDeleteExpensesInput,
  validateUpdateExpensesInput,
  sanitizeAddExpenseInput,
  sanitizeDateRangeInput,
  sanitizeSummarizeInput,
  sanitizeDeleteExpensesInput,
  sanitizeUpdateExpensesInput
} from './validation';
import {
  AddExpenseInput,
  DateRangeInput,
  DeleteExpensesInput,
  ErrorResult,
  SummarizeInput,
  UpdateExpensesInput,
  ValidationResult
} from './types';

export interface AppDependencies {
  operations: ExpenseOperations;
  categoriesPath: string;
}

interface ToolResponse {
  httpStatus: number;
  body: object;
}

interface Tool {
  description: string;
  invoke(args: unknown): ToolResponse;
}

function defineTool<I>(
  description: string,
  validate: (input: unknown) => ValidationResult,
  sanitize: (input: I) => I,
  run: (input: I) => object
): Tool {
  return {
    description,
    invoke(args: unknown): ToolResponse {
      const validation = validate(args);
      if (!validation.valid) {
        const error: ErrorResult = {
          status: 'error',
          message: 'Validation failed',
          details: validation.errors
        };
        return { httpStatus: 400, body: error };
      }
      return { httpStatus: 200, body: run(sanitize(args as I)) };
    }
  };
}

export function createTools(operations: ExpenseOperations): Record<string, Tool> {
  return {
    add_expense: defineTool<AddExpenseInput>(
      'Add a new expense entry',
      validateAddExpenseInput,
      sanitizeAddExpenseInput,
      input => operations.addExpense(input)
    ),
    credit_expense: defineTool<AddExpenseInput>(
      'Record a credit (negative expense) entry',
      validateAddExpenseInput,
      sanitizeAddExpenseInput,
      input => operations.creditExpense(input)
    ),
    list_expenses: defineTool<DateRangeInput>(
      'List expense entries within an inclusive date range',
      validateDateRangeInput,
      sanitizeDateRangeInput,
      input => operations.listExpenses(input)
    ),
    summarize: defineTool<SummarizeInput>(
      'Summarize expenses by category within an inclusive date range',
      validateSummarizeInput,
      sanitizeSummarizeInput,
      input => operations.summarize(input)
    ),
    delete_expenses: defineTool<DeleteExpensesInput>(
      'Delete expense entries matching filters, optionally as a dry run',
      validateDeleteExpensesInput,
      sanitizeDeleteExpensesInput,
      input => operations.deleteExpenses(input)
    ),
    update_expenses: defineTool<UpdateExpensesInput>(
      'Update expense entries matching filters, optionally as a dry run',
      validateUpdateExpensesInput,
      sanitizeUpdateExpensesInput,
      input => operations.updateExpenses(input)
    )
  };
}

export function createApp({ operations, categoriesPath }: AppDependencies): Express {
  const app = express();
  const tools = createTools(operations);

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // GET /tools - List callable procedures
  app.get('/tools', (_req: Request, res: Response) => {
    return res.json(
      Object.entries(tools).map(([name, tool]) => ({ name, description: tool.description }))
    );
  });

  // POST /tools/:name - Invoke a procedure with named arguments in the body
  app.post('/tools/:name', (req: Request, res: Response) => {
    const { name } = req.params;
    const tool = Object.prototype.hasOwnProperty.call(tools, name) ? tools[name] : undefined;
    if (!tool) {
      const error: ErrorResult = { status: 'error', message: `Unknown tool: ${name}` };
      return res.status(404).json(error);
    }

    const { httpStatus, body } = tool.invoke(req.body);
    return res.status(httpStatus).json(body);
  });

  // GET /resources/categories - Category list, re-read on every request
  app.get('/resources/categories', (_req: Request, res: Response) => {
    const result = getCategories(categoriesPath);
    if ('status' in result) {
      return res.json(result);
    }
    return res.json({ categories: result.categories });
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    return res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    return res.status(404).json({ status: 'error', message: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ status: 'error', message: 'Request body must be valid JSON' });
    }
    console.error('Unhandled error:', err);
    return res.status(500).json({ status: 'error', message: 'Internal server error' });
  });

  return app;
}
