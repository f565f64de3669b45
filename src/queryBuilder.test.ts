import {
  ClauseBuilder,
  buildSet,
  buildWhere,
  noFiltersMessage,
  NO_UPDATE_VALUES_MESSAGE
} from './queryBuilder';

describe('ClauseBuilder', () => {
  it('should render fragments and params in insertion order', () => {
    const clause = new ClauseBuilder()
      .add('a = ?', 1)
      .add('b BETWEEN ? AND ?', 'x', 'y')
      .add('c = ?', 'z')
      .render(' AND ');

    expect(clause.sql).toBe('a = ? AND b BETWEEN ? AND ? AND c = ?');
    expect(clause.params).toEqual([1, 'x', 'y', 'z']);
  });

  it('should skip undefined and null values but keep empty strings and zero', () => {
    const builder = new ClauseBuilder()
      .addIfPresent('a = ?', undefined)
      .addIfPresent('b = ?', null)
      .addIfPresent('c = ?', '')
      .addIfPresent('d = ?', 0);

    expect(builder.size).toBe(2);
    expect(builder.render(', ')).toEqual({ sql: 'c = ?, d = ?', params: ['', 0] });
  });
});

describe('buildWhere', () => {
  it('should AND together every present filter', () => {
    const result = buildWhere(
      {
        id: 3,
        date: '2024-01-05',
        startDate: '2024-01-01',
        endDate: '2024-01-31',
        category: 'Food',
        subcategory: 'Groceries'
      },
      'delete'
    );

    expect(result).toEqual({
      ok: true,
      clause: {
        sql: 'id = ? AND date = ? AND date BETWEEN ? AND ? AND category = ? AND subcategory = ?',
        params: [3, '2024-01-05', '2024-01-01', '2024-01-31', 'Food', 'Groceries']
      }
    });
  });

  it('should build a single predicate for a single filter', () => {
    expect(buildWhere({ category: 'Food' }, 'delete')).toEqual({
      ok: true,
      clause: { sql: 'category = ?', params: ['Food'] }
    });
  });

  it('should treat an empty string as a filter value', () => {
    expect(buildWhere({ subcategory: '' }, 'update')).toEqual({
      ok: true,
      clause: { sql: 'subcategory = ?', params: [''] }
    });
  });

  it('should decline when no filter is present', () => {
    expect(buildWhere({}, 'delete')).toEqual({
      ok: false,
      error: 'No filters provided. Refusing to delete all records.'
    });
  });

  it('should decline when every filter is null', () => {
    const result = buildWhere(
      { id: null, date: null, startDate: null, endDate: null, category: null, subcategory: null },
      'update'
    );
    expect(result).toEqual({ ok: false, error: noFiltersMessage('update') });
  });

  it('should ignore a lone start date', () => {
    expect(buildWhere({ startDate: '2024-01-01' }, 'delete')).toEqual({
      ok: false,
      error: noFiltersMessage('delete')
    });
  });

  it('should ignore a lone end date next to other filters', () => {
    expect(buildWhere({ endDate: '2024-01-31', category: 'Food' }, 'delete')).toEqual({
      ok: true,
      clause: { sql: 'category = ?', params: ['Food'] }
    });
  });
});

describe('buildSet', () => {
  it('should assign every present value in column order', () => {
    const result = buildSet({
      note: 'moved',
      category: 'Travel',
      amount: 42.5,
      date: '2024-02-01',
      subcategory: 'Flights'
    });

    expect(result).toEqual({
      ok: true,
      clause: {
        sql: 'date = ?, amount = ?, category = ?, subcategory = ?, note = ?',
        params: ['2024-02-01', 42.5, 'Travel', 'Flights', 'moved']
      }
    });
  });

  it('should keep zero amounts and empty strings', () => {
    expect(buildSet({ amount: 0, note: '' })).toEqual({
      ok: true,
      clause: { sql: 'amount = ?, note = ?', params: [0, ''] }
    });
  });

  it('should decline when no new value is present', () => {
    expect(buildSet({ date: null, amount: undefined })).toEqual({
      ok: false,
      error: NO_UPDATE_VALUES_MESSAGE
    });
  });
});
