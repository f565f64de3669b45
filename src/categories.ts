import fs from 'fs';
import { ErrorResult } from './types';

export const DEFAULT_CATEGORIES: readonly string[] = [
  'Food',
  'Transport',
  'Housing',
  'Utilities',
  'Health',
  'Entertainment',
  'Shopping',
  'Education',
  'Travel',
  'Other'
];

export interface CategoryList {
  categories: string[];
  source: 'file' | 'default';
}

export type CategoriesResult = CategoryList | ErrorResult;

function readCategoriesFile(filePath: string): string | null {
  return fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf-8') : null;
}

function parseCategories(text: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('categories' in parsed)) return null;
  const { categories } = parsed;
  if (!Array.isArray(categories)) return null;

  const names = categories.filter((c): c is string => typeof c === 'string');
  return names.length === categories.length ? names : null;
}

// Read on every call so edits to the file show up without a restart
export function getCategories(filePath: string): CategoriesResult {
  let text: string | null;
  try {
    text = readCategoriesFile(filePath);
  } catch (error) {
    console.error('Error reading categories:', error);
    return { status: 'error', message: `Categories file ${filePath} could not be read` };
  }

  if (text === null) {
    return { categories: [...DEFAULT_CATEGORIES], source: 'default' };
  }

  const categories = parseCategories(text);
  if (categories === null) {
    return {
      status: 'error',
      message: `Categories file ${filePath} is not a valid {"categories": [...]} JSON document`
    };
  }

  return { categories, source: 'file' };
}
