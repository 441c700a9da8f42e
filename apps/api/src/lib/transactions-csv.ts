/**
 * CSV encoding for the transaction export and its re-import
 *
 * Columns are fixed: id, date, amount, type, category, tags, notes, created_at.
 * Absent optional fields are written as empty cells and read back as absent.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ValidationError, type ImportedTransactionInput, type Transaction } from '@ledger/core';

export const CSV_COLUMNS = [
  'id',
  'date',
  'amount',
  'type',
  'category',
  'tags',
  'notes',
  'created_at',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

const CsvRowsSchema = z.array(z.array(z.string()));

export function formatTransactionsCsv(transactions: readonly Transaction[]): string {
  const records = transactions.map(
    (transaction): Record<CsvColumn, string | number | null> => ({
      id: transaction.id,
      date: transaction.date,
      amount: transaction.amount,
      type: transaction.type,
      category: transaction.category,
      tags: transaction.tags,
      notes: transaction.notes,
      created_at: transaction.createdAt,
    })
  );

  return stringify(records, { header: true, columns: [...CSV_COLUMNS] });
}

/**
 * Read an export back into import records. Structural problems (bad quoting,
 * ragged rows, a header without the export columns) raise ValidationError;
 * field values are validated later by the transaction service.
 */
export function parseTransactionsCsv(text: string): ImportedTransactionInput[] {
  let parsed: unknown;
  try {
    parsed = parse(text, { bom: true, skip_empty_lines: true });
  } catch (error) {
    throw new ValidationError(
      `Malformed CSV: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const rows = CsvRowsSchema.parse(parsed);
  const [header, ...body] = rows;
  if (!header) {
    throw new ValidationError('CSV is empty; expected a header row');
  }

  const positions = new Map(header.map((name, index) => [name.trim(), index]));
  const missing = CSV_COLUMNS.filter((column) => !positions.has(column));
  if (missing.length > 0) {
    throw new ValidationError(`CSV header is missing columns: ${missing.join(', ')}`);
  }

  const cell = (row: string[], column: CsvColumn): string => row[positions.get(column) ?? -1] ?? '';

  return body.map((row) => ({
    id: cell(row, 'id'),
    date: cell(row, 'date'),
    amount: cell(row, 'amount'),
    type: cell(row, 'type'),
    category: cell(row, 'category'),
    tags: cell(row, 'tags'),
    notes: cell(row, 'notes'),
    createdAt: cell(row, 'created_at'),
  }));
}
