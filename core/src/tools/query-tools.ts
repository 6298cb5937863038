import { z } from 'zod';
import { fromDateKey, toDateKey } from '@tally/db';
import type { Transaction } from '@tally/db';
import type { QueryOps } from '../query-ops';
import { defineTool, jsonResult, Tool } from './tool';

const DEFAULT_LATEST_LIMIT = 10;

const Id = z.number().int().positive();
// Rejects keys such as 2024-02-30 that Date would roll into the next month
function isCalendarDate(key: string): boolean {
  const date = new Date(`${key}T00:00:00.000Z`);
  return !Number.isNaN(date.getTime()) && toDateKey(date) === key;
}

const DateKey = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine(isCalendarDate, 'not a calendar date');

const AccountLookup = z
  .object({ accountId: Id.optional(), name: z.string().min(1).optional() })
  .refine(p => p.accountId !== undefined || p.name !== undefined, {
    message: 'accountId or name is required',
  });

const Keyword = z.object({ keyword: z.string() });
const AccountScope = z.object({ accountId: Id });

// Transactions go out with their date as a calendar date
function presentTransaction(t: Transaction) {
  return { ...t, transactionDate: toDateKey(t.transactionDate) };
}

/** One tool per read operation of the query facade. */
export function createQueryTools(ops: QueryOps): Tool[] {
  return [
    defineTool(
      'get_account',
      'Get an account by id or by exact name',
      AccountLookup,
      ({ accountId, name }, signal) =>
        jsonResult(
          accountId !== undefined
            ? ops.getAccountById(accountId, signal)
            : ops.getAccountByName(name ?? '', signal)
        )
    ),
    defineTool(
      'search_accounts',
      'Find accounts whose name contains the keyword (case-insensitive)',
      Keyword,
      ({ keyword }, signal) => jsonResult(ops.searchAccounts(keyword, signal))
    ),
    defineTool(
      'list_accounts',
      'List every account',
      z.object({}),
      (_params, signal) => jsonResult(ops.getAllAccounts(signal))
    ),
    defineTool(
      'list_categories',
      'List categories, optionally only those of one type (e.g. EXPENSE, INCOME)',
      z.object({ categoryType: z.string().min(1).optional() }),
      ({ categoryType }, signal) =>
        jsonResult(
          categoryType !== undefined
            ? ops.getCategoriesByType(categoryType, signal)
            : ops.getAllCategories(signal)
        )
    ),
    defineTool(
      'search_categories',
      'Find categories whose name contains the keyword (case-insensitive)',
      Keyword,
      ({ keyword }, signal) => jsonResult(ops.searchCategories(keyword, signal))
    ),
    defineTool(
      'get_transaction',
      'Get a transaction by id',
      z.object({ transactionId: Id }),
      ({ transactionId }, signal) =>
        jsonResult(presentTransaction(ops.getTransactionById(transactionId, signal)))
    ),
    defineTool(
      'list_account_transactions',
      'List an account\'s transactions, optionally within an inclusive date range (newest first when a range is given)',
      z.object({ accountId: Id, start: DateKey.optional(), end: DateKey.optional() }),
      ({ accountId, start, end }, signal) => {
        const transactions = start !== undefined || end !== undefined
          ? ops.getTransactionsByAccountAndDateRange(
            accountId,
            fromDateKey(start ?? '0001-01-01'),
            fromDateKey(end ?? '9999-12-31'),
            signal
          )
          : ops.getTransactionsByAccountId(accountId, signal);
        return jsonResult(transactions.map(presentTransaction));
      }
    ),
    defineTool(
      'transactions_by_date',
      'List transactions of every account dated within an inclusive range',
      z.object({ start: DateKey, end: DateKey }),
      ({ start, end }, signal) =>
        jsonResult(
          ops.getTransactionsByDateRange(fromDateKey(start), fromDateKey(end), signal)
            .map(presentTransaction)
        )
    ),
    defineTool(
      'search_transactions',
      'Find transactions whose description contains the keyword (case-insensitive)',
      Keyword,
      ({ keyword }, signal) =>
        jsonResult(ops.searchTransactionsByDescription(keyword, signal).map(presentTransaction))
    ),
    defineTool(
      'account_balance',
      'Sum and count of an account\'s transactions',
      AccountScope,
      ({ accountId }, signal) =>
        jsonResult({
          accountId,
          balance: ops.getAccountBalance(accountId, signal),
          transactionCount: ops.getTransactionCount(accountId, signal),
        })
    ),
    defineTool(
      'latest_transactions',
      'Most recent transactions of an account',
      z.object({ accountId: Id, limit: z.number().int().positive().default(DEFAULT_LATEST_LIMIT) }),
      ({ accountId, limit }, signal) =>
        jsonResult(ops.getLatestTransactions(accountId, limit, signal).map(presentTransaction))
    ),
    defineTool(
      'category_summary',
      'Total amount and count of an account\'s transactions per category',
      AccountScope,
      ({ accountId }, signal) => jsonResult(ops.getTransactionSummaryByCategory(accountId, signal))
    ),
  ];
}
