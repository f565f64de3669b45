import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_CATEGORIES, getCategories } from './categories';

describe('getCategories', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'expense-categories-'));
    filePath = path.join(dir, 'categories.json');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to the ten default categories when the file is missing', () => {
    const result = getCategories(filePath);

    expect(result).toEqual({ categories: [...DEFAULT_CATEGORIES], source: 'default' });
    expect(DEFAULT_CATEGORIES).toHaveLength(10);
  });

  it('should read categories from the file in order', () => {
    fs.writeFileSync(filePath, JSON.stringify({ categories: ['Rent', 'Food', 'Pets'] }));
    expect(getCategories(filePath)).toEqual({ categories: ['Rent', 'Food', 'Pets'], source: 'file' });
  });

  it('should pick up edits on the next read', () => {
    fs.writeFileSync(filePath, JSON.stringify({ categories: ['Rent'] }));
    getCategories(filePath);
    fs.writeFileSync(filePath, JSON.stringify({ categories: ['Rent', 'Gifts'] }));

    expect(getCategories(filePath)).toEqual({ categories: ['Rent', 'Gifts'], source: 'file' });
  });

  it('should return an error payload for invalid JSON', () => {
    fs.writeFileSync(filePath, '{"categories": [');
    expect(getCategories(filePath)).toEqual({
      status: 'error',
      message: `Categories file ${filePath} is not a valid {"categories": [...]} JSON document`
    });
  });

  it('should return an error payload for the wrong shape', () => {
    fs.writeFileSync(filePath, JSON.stringify({ categories: ['Food', 3] }));
    expect(getCategories(filePath)).toMatchObject({ status: 'error' });

    fs.writeFileSync(filePath, JSON.stringify(['Food']));
    expect(getCategories(filePath)).toMatchObject({ status: 'error' });
  });

  it('should return an error payload when the path cannot be read', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(getCategories(dir)).toEqual({
      status: 'error',
      message: `Categories file ${dir} could not be read`
    });
  });
});
