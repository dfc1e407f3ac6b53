import { describe, it, expect } from 'vitest';
import {
  InvalidAmountError,
  MAX_AMOUNT,
  ValidationError,
  parseAmount,
  parseCategory,
  parseDate,
  parseExpenseMap,
  parseIncome,
  parseTransactionInput,
  today,
} from '../validation';

describe('parseAmount', () => {
  it('accepts zero and rounds to cents', () => {
    expect(parseAmount(0, 'amount')).toBe(0);
    expect(parseAmount(19.999, 'amount')).toBe(20);
  });

  it('rejects negative and infinite amounts as InvalidAmountError', () => {
    expect(() => parseAmount(-0.01, 'amount')).toThrow(InvalidAmountError);
    expect(() => parseAmount(Infinity, 'amount')).toThrow(InvalidAmountError);
    expect(() => parseAmount(-5, 'amount')).toThrow('amount must be a non-negative amount, got -5');
  });

  it('caps amounts at MAX_AMOUNT so cent sums stay exact', () => {
    expect(parseAmount(MAX_AMOUNT, 'amount')).toBe(1e12);
    expect(() => parseAmount(1e307, 'amount')).toThrow(InvalidAmountError);
    expect(() => parseAmount(1e307, 'amount')).toThrow('amount must be at most 1000000000000, got 1e+307');
    expect(() => parseExpenseMap({ Housing: 2e12 })).toThrow(
      'expenses.Housing must be at most 1000000000000, got 2000000000000',
    );
  });

  it('rejects non-numbers as a plain ValidationError', () => {
    let caught: unknown;
    try {
      parseAmount('5', 'amount');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).not.toBeInstanceOf(InvalidAmountError);
    expect(() => parseAmount(NaN, 'amount')).toThrow('amount must be a number');
  });

  it('parseIncome reports the income field', () => {
    expect(() => parseIncome(-100)).toThrow('income must be a non-negative amount, got -100');
  });
});

describe('parseCategory', () => {
  it('accepts the fixed categories only', () => {
    expect(parseCategory('Healthcare')).toBe('Healthcare');
    expect(() => parseCategory('Groceries')).toThrow(
      'category must be one of Housing, Food, Transportation, Entertainment, Healthcare, Other',
    );
  });
});

describe('parseDate', () => {
  it('defaults to the local date', () => {
    const now = new Date(2025, 0, 5, 14, 30);
    expect(today(now)).toBe('2025-01-05');
    expect(parseDate(undefined, now)).toBe('2025-01-05');
    expect(parseDate('', now)).toBe('2025-01-05');
  });

  it('accepts real calendar dates', () => {
    expect(parseDate('2024-02-29')).toBe('2024-02-29');
  });

  it('rejects malformed or impossible dates', () => {
    expect(() => parseDate('2025-1-5')).toThrow('date must be a YYYY-MM-DD string');
    expect(() => parseDate(20250105)).toThrow('date must be a YYYY-MM-DD string');
    expect(() => parseDate('2025-02-29')).toThrow('date 2025-02-29 is not a calendar date');
  });
});

describe('parseTransactionInput', () => {
  it('builds a transaction with a trimmed description', () => {
    expect(
      parseTransactionInput({ amount: 12.5, category: 'Food', description: '  lunch  ', date: '2025-03-01' }),
    ).toEqual({ amount: 12.5, category: 'Food', description: 'lunch', date: '2025-03-01' });
  });

  it('drops a blank description and fills in the date', () => {
    const txn = parseTransactionInput({ amount: 3, category: 'Other', description: '   ' }, new Date(2025, 5, 30));
    expect(txn).toEqual({ amount: 3, category: 'Other', date: '2025-06-30' });
    expect('description' in txn).toBe(false);
  });

  it('rejects negative amounts before they reach the aggregator', () => {
    expect(() => parseTransactionInput({ amount: -20, category: 'Food' })).toThrow(InvalidAmountError);
  });

  it('rejects non-object bodies', () => {
    expect(() => parseTransactionInput(null)).toThrow('transaction must be an object');
    expect(() => parseTransactionInput([1, 2])).toThrow('transaction must be an object');
  });
});

describe('parseExpenseMap', () => {
  it('drops zero amounts and keeps key order', () => {
    const map = parseExpenseMap({ Housing: 1000, Food: 0, Other: 25 });
    expect(map).toEqual({ Housing: 1000, Other: 25 });
    expect(Object.keys(map)).toEqual(['Housing', 'Other']);
  });

  it('rejects unknown categories and negative amounts', () => {
    expect(() => parseExpenseMap({ Rent: 5 })).toThrow(ValidationError);
    expect(() => parseExpenseMap({ Food: -1 })).toThrow('expenses.Food must be a non-negative amount, got -1');
    expect(() => parseExpenseMap([])).toThrow('expenses must be an object of category → amount');
  });
});
