/**
 * Boundary validation: turns untrusted request bodies into domain values.
 * Everything past this point may assume amounts between 0 and MAX_AMOUNT.
 */
import { EXPENSE_CATEGORIES, type ExpenseCategory, type ExpenseMap, type Transaction } from './types';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Largest accepted amount, in dollars. Sums run in integer cents and must
 * stay below Number.MAX_SAFE_INTEGER.
 */
export const MAX_AMOUNT = 1e12;

export class InvalidAmountError extends ValidationError {
  constructor(
    readonly field: string,
    readonly value: number,
  ) {
    super(
      value > MAX_AMOUNT
        ? `${field} must be at most ${MAX_AMOUNT}, got ${value}`
        : `${field} must be a non-negative amount, got ${value}`,
    );
    this.name = 'InvalidAmountError';
  }
}

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Round to whole cents */
export function roundCents(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Throws unless 0 <= n <= MAX_AMOUNT */
export function assertAmount(n: number, field: string): void {
  if (!Number.isFinite(n) || n < 0 || n > MAX_AMOUNT) {
    throw new InvalidAmountError(field, n);
  }
}

export function parseAmount(value: unknown, field: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ValidationError(`${field} must be a number`);
  }
  assertAmount(value, field);
  return roundCents(value);
}

export function isExpenseCategory(value: unknown): value is ExpenseCategory {
  return typeof value === 'string' && EXPENSE_CATEGORIES.some((item) => item === value);
}

export function parseCategory(value: unknown): ExpenseCategory {
  if (!isExpenseCategory(value)) {
    throw new ValidationError(
      `category must be one of ${EXPENSE_CATEGORIES.join(', ')}`,
    );
  }
  return value;
}

/** Local calendar date as YYYY-MM-DD */
export function today(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function parseDate(value: unknown, now: Date = new Date()): string {
  if (value === undefined || value === null || value === '') return today(now);
  if (typeof value !== 'string') {
    throw new ValidationError('date must be a YYYY-MM-DD string');
  }
  const match = DATE_RE.exec(value);
  if (!match) {
    throw new ValidationError('date must be a YYYY-MM-DD string');
  }
  const [, y, m, d] = match;
  const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  // Date.UTC rolls 2025-02-30 over into March
  if (
    parsed.getUTCFullYear() !== Number(y) ||
    parsed.getUTCMonth() !== Number(m) - 1 ||
    parsed.getUTCDate() !== Number(d)
  ) {
    throw new ValidationError(`date ${value} is not a calendar date`);
  }
  return value;
}

export function parseTransactionInput(body: unknown, now: Date = new Date()): Transaction {
  if (!isRecord(body)) {
    throw new ValidationError('transaction must be an object');
  }
  const txn: Transaction = {
    amount: parseAmount(body.amount, 'amount'),
    category: parseCategory(body.category),
    date: parseDate(body.date, now),
  };
  if (body.description !== undefined && body.description !== null) {
    if (typeof body.description !== 'string') {
      throw new ValidationError('description must be a string');
    }
    const description = body.description.trim();
    if (description) txn.description = description;
  }
  return txn;
}

export function parseIncome(value: unknown): number {
  return parseAmount(value, 'income');
}

/**
 * Builds a fresh expense map. Categories with a zero amount are dropped,
 * keys keep the order they were given in.
 */
export function parseExpenseMap(value: unknown): ExpenseMap {
  if (!isRecord(value)) {
    throw new ValidationError('expenses must be an object of category → amount');
  }
  const out: Record<string, number> = {};
  for (const [key, raw] of Object.entries(value)) {
    const category = parseCategory(key);
    const amount = parseAmount(raw, `expenses.${category}`);
    if (amount > 0) out[category] = amount;
  }
  return out;
}
