import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { clickhouse } from '../config/clickhouse';
import { logger } from '../config/logger';
import type { Corpus } from '../types/corpus';
import type { CorpusFile } from './csv';

const INSERT_BATCH_SIZE = 1000;

/**
 * Write rendered tables into `dir`, creating it if needed.
 * Returns the written paths in table order.
 */
export async function writeCorpusFiles(files: readonly CorpusFile[], dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true });

  const paths: string[] = [];
  for (const file of files) {
    const target = path.join(dir, file.name);
    await writeFile(target, file.content, 'utf8');
    paths.push(target);
  }

  logger.info({ dir, files: paths.length }, 'Wrote corpus files');
  return paths;
}

/** DateTime64(3) literal */
function toClickHouseTime(timestamp: number): string {
  return new Date(timestamp).toISOString().replace('T', ' ').replace('Z', '');
}

async function insertBatches<T>(table: string, rows: readonly T[]): Promise<void> {
  for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
    await clickhouse.insert({
      table,
      values: rows.slice(i, i + INSERT_BATCH_SIZE),
      format: 'JSONEachRow',
    });
  }
}

/**
 * Load both tables into ClickHouse under a run id.
 * Returns the number of rows inserted per table.
 */
export async function insertCorpus(
  corpus: Corpus,
  runId: string
): Promise<{ momo: number; bank: number }> {
  const momoRows = corpus.momo.map((record) => ({
    ...record,
    run_id: runId,
    timestamp: toClickHouseTime(record.timestamp),
  }));
  const bankRows = corpus.bank.map((record) => ({
    ...record,
    run_id: runId,
    timestamp: toClickHouseTime(record.timestamp),
  }));

  await insertBatches('momo_transactions', momoRows);
  await insertBatches('bank_transactions', bankRows);

  logger.info({ run_id: runId, momo: momoRows.length, bank: bankRows.length }, 'Loaded corpus into ClickHouse');
  return { momo: momoRows.length, bank: bankRows.length };
}
