/**
 * CSV Serialization
 *
 * Renders each table with a header row, columns in a fixed order, currency
 * at two decimals, ISO-8601 timestamps and empty fields for nulls.
 */

import type { Corpus } from '../types/corpus';
import type { BankTransaction, Channel, MomoTransaction } from '../types/transaction';
import { formatTimestamp } from './time';

type CellKind = 'text' | 'currency' | 'timestamp';

export interface Column<T> {
  key: keyof T & string;
  kind: CellKind;
}

export interface CorpusFile {
  channel: Channel;
  name: string;
  content: string;
}

export const MOMO_COLUMNS: ReadonlyArray<Column<MomoTransaction>> = [
  { key: 'transaction_id', kind: 'text' },
  { key: 'timestamp', kind: 'timestamp' },
  { key: 'sender_account', kind: 'text' },
  { key: 'receiver_account', kind: 'text' },
  { key: 'amount_ghs', kind: 'currency' },
  { key: 'transaction_type', kind: 'text' },
  { key: 'channel', kind: 'text' },
  { key: 'agent_id', kind: 'text' },
  { key: 'merchant_category', kind: 'text' },
  { key: 'location_region', kind: 'text' },
  { key: 'device_id', kind: 'text' },
  { key: 'is_new_device', kind: 'text' },
  { key: 'otp_requested', kind: 'text' },
  { key: 'linked_bank_account', kind: 'text' },
  { key: 'income_tier', kind: 'text' },
  { key: 'personal_alert_threshold', kind: 'currency' },
  { key: 'label', kind: 'text' },
  { key: 'attack_type', kind: 'text' },
];

export const BANK_COLUMNS: ReadonlyArray<Column<BankTransaction>> = [
  { key: 'transaction_id', kind: 'text' },
  { key: 'timestamp', kind: 'timestamp' },
  { key: 'account_id', kind: 'text' },
  { key: 'linked_momo_account', kind: 'text' },
  { key: 'amount_ghs', kind: 'currency' },
  { key: 'transaction_type', kind: 'text' },
  { key: 'channel', kind: 'text' },
  { key: 'counterparty_account', kind: 'text' },
  { key: 'balance_before_ghs', kind: 'currency' },
  { key: 'balance_after_ghs', kind: 'currency' },
  { key: 'location_region', kind: 'text' },
  { key: 'is_after_hours', kind: 'text' },
  { key: 'income_tier', kind: 'text' },
  { key: 'personal_alert_threshold', kind: 'currency' },
  { key: 'label', kind: 'text' },
  { key: 'attack_type', kind: 'text' },
];

export const CORPUS_FILE_NAMES: Record<Channel, string> = {
  momo: 'momo_transactions.csv',
  bank: 'bank_transactions.csv',
};

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: unknown, kind: CellKind): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'number') {
    if (kind === 'currency') {
      return value.toFixed(2);
    }
    if (kind === 'timestamp') {
      return formatTimestamp(value);
    }
  }
  return escapeCsv(String(value));
}

export function toCsv<T>(records: readonly T[], columns: ReadonlyArray<Column<T>>): string {
  const lines = [columns.map((c) => c.key).join(',')];

  for (const record of records) {
    lines.push(columns.map((c) => formatCell(record[c.key], c.kind)).join(','));
  }

  return lines.join('\n') + '\n';
}

export function momoToCsv(records: readonly MomoTransaction[]): string {
  return toCsv(records, MOMO_COLUMNS);
}

export function bankToCsv(records: readonly BankTransaction[]): string {
  return toCsv(records, BANK_COLUMNS);
}

/**
 * Render both tables
 */
export function renderCorpusFiles(corpus: Corpus): CorpusFile[] {
  return [
    { channel: 'momo', name: CORPUS_FILE_NAMES.momo, content: momoToCsv(corpus.momo) },
    { channel: 'bank', name: CORPUS_FILE_NAMES.bank, content: bankToCsv(corpus.bank) },
  ];
}
