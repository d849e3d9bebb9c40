import { createClient } from '@clickhouse/client';
import { logger } from './logger';

const CLICKHOUSE_HOST = process.env.CLICKHOUSE_HOST || 'http://localhost:8123';
const CLICKHOUSE_USER = process.env.CLICKHOUSE_USER || 'default';
const CLICKHOUSE_PASSWORD = process.env.CLICKHOUSE_PASSWORD || '';
export const CLICKHOUSE_DATABASE = process.env.CLICKHOUSE_DATABASE || 'fraud_corpus';

export const clickhouse = createClient({
  url: CLICKHOUSE_HOST,
  username: CLICKHOUSE_USER,
  password: CLICKHOUSE_PASSWORD,
  database: CLICKHOUSE_DATABASE,
});

/**
 * Create the database and both transaction tables if they don't exist
 */
export async function initClickHouse(): Promise<void> {
  await clickhouse.command({
    query: `CREATE DATABASE IF NOT EXISTS ${CLICKHOUSE_DATABASE}`,
  });

  // MergeTree ordered by account then time: velocity queries scan one account's window
  await clickhouse.command({
    query: `
      CREATE TABLE IF NOT EXISTS ${CLICKHOUSE_DATABASE}.momo_transactions (
        run_id String,
        transaction_id String,
        timestamp DateTime64(3),
        sender_account String,
        receiver_account String,
        amount_ghs Decimal(18, 2),
        transaction_type LowCardinality(String),
        channel LowCardinality(String),
        agent_id Nullable(String),
        merchant_category LowCardinality(String),
        location_region LowCardinality(String),
        device_id String,
        is_new_device Bool,
        otp_requested Bool,
        linked_bank_account Nullable(String),
        income_tier LowCardinality(String),
        personal_alert_threshold Decimal(18, 2),
        label UInt8,
        attack_type LowCardinality(String)
      )
      ENGINE = MergeTree()
      ORDER BY (run_id, sender_account, timestamp)
    `,
  });

  await clickhouse.command({
    query: `
      CREATE TABLE IF NOT EXISTS ${CLICKHOUSE_DATABASE}.bank_transactions (
        run_id String,
        transaction_id String,
        timestamp DateTime64(3),
        account_id String,
        linked_momo_account String,
        amount_ghs Decimal(18, 2),
        transaction_type LowCardinality(String),
        channel LowCardinality(String),
        counterparty_account String,
        balance_before_ghs Decimal(18, 2),
        balance_after_ghs Decimal(18, 2),
        location_region LowCardinality(String),
        is_after_hours Bool,
        income_tier LowCardinality(String),
        personal_alert_threshold Decimal(18, 2),
        label UInt8,
        attack_type LowCardinality(String)
      )
      ENGINE = MergeTree()
      ORDER BY (run_id, account_id, timestamp)
    `,
  });

  logger.info({ database: CLICKHOUSE_DATABASE }, 'ClickHouse initialized');
}
