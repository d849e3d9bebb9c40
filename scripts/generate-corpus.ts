/**
 * Generate Synthetic Fraud Corpus
 *
 * Builds the customer population, legitimate MoMo and bank traffic and the
 * four attack patterns, then writes both tables as CSV.
 *
 * Configuration comes from CORPUS_* environment variables.
 *
 * Run: npm run generate -- [--verify] [--clickhouse] [--backup]
 */

import { v4 as uuidv4 } from 'uuid';
import { loadGeneratorConfig } from '../src/config/generator';
import { BOG_REPORTING_THRESHOLD } from '../src/config/catalogs';
import { initClickHouse } from '../src/config/clickhouse';
import { initMinio } from '../src/config/minio';
import { checkAttackInvariants, checkCorpusInvariants, generateCorpus } from '../src/utils/corpus';
import { renderCorpusFiles } from '../src/utils/csv';
import { writeCorpusFiles, insertCorpus } from '../src/utils/storage';
import { backupCorpus } from '../src/utils/backup';
import { ConfigurationError } from '../src/utils/errors';

function log(emoji: string, message: string) {
  console.log(`${emoji}  ${message}`);
}

function count(n: number): string {
  return n.toLocaleString('en-US');
}

async function main() {
  const flags = new Set(process.argv.slice(2));
  const config = loadGeneratorConfig();
  const runId = uuidv4();

  console.log('\n=======================================================');
  console.log('  SYNTHETIC MOMO + BANK FRAUD CORPUS');
  console.log('=======================================================\n');

  log('[1/5]', 'Generating profiles, legitimate traffic and attack patterns...');
  const { profiles, corpus, summary, tiers, instances, attacks } = generateCorpus(config);

  log(
    '     ',
    `Customers: ${count(profiles.length)} (Low ${tiers.low} | Middle ${tiers.middle} | High ${tiers.high})`
  );
  log(
    '     ',
    `Legitimate: ${count(summary.momo.legitimate)} MoMo | ${count(summary.bank.legitimate)} bank`
  );
  log(
    '     ',
    `Instances: OTP ${instances.otp_phishing} | ATO ${instances.account_takeover} | ` +
      `Drain ${instances.structured_drain} | Lateral ${instances.lateral_movement}`
  );

  if (flags.has('--verify')) {
    log('[2/5]', 'Verifying corpus invariants...');
    const violations = [
      ...checkCorpusInvariants(corpus, profiles),
      ...checkAttackInvariants(attacks, {
        reference: config.reference_time,
        days: config.attack_window_days,
      }),
    ];
    if (violations.length > 0) {
      for (const v of violations.slice(0, 20)) {
        log('X', `${v.channel} ${v.transaction_id}: ${v.rule}`);
      }
      throw new Error(`${violations.length} invariant violations, nothing written`);
    }
    log('OK', 'Invariants hold');
  } else {
    log('[2/5]', 'Skipping verification (pass --verify to check invariants)');
  }

  log('[3/5]', 'Saving datasets...');
  const files = renderCorpusFiles(corpus);
  const written = await writeCorpusFiles(files, config.output_dir);
  for (const file of written) {
    log('OK', `Wrote ${file}`);
  }

  log('[4/5]', 'Loading optional sinks...');
  if (flags.has('--clickhouse')) {
    await initClickHouse();
    const inserted = await insertCorpus(corpus, runId);
    log('OK', `ClickHouse: ${count(inserted.momo)} MoMo, ${count(inserted.bank)} bank rows (run ${runId})`);
  }

  if (flags.has('--backup')) {
    await initMinio();
    const keys = await backupCorpus(files, runId);
    for (const key of keys) {
      log('OK', `Backed up ${key}`);
    }
  }

  log('[5/5]', 'Done!\n');

  console.log('=======================================================');
  console.log(`  MoMo transactions : ${count(summary.momo.total)}`);
  console.log(`    Legitimate      : ${count(summary.momo.legitimate)}`);
  console.log(`    Fraudulent      : ${count(summary.momo.fraudulent)}`);
  console.log(`\n  Bank transactions : ${count(summary.bank.total)}`);
  console.log(`    Legitimate      : ${count(summary.bank.legitimate)}`);
  console.log(`    Fraudulent      : ${count(summary.bank.fraudulent)}`);
  console.log(`\n  Saved to  : ${config.output_dir}/`);
  console.log(`  BoG floor : GHS ${count(BOG_REPORTING_THRESHOLD)} (regulatory floor only)`);
  console.log('  Detection : behavioural baselining per customer');
  console.log('=======================================================\n');
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    if (err instanceof ConfigurationError) {
      console.error(`Configuration error: ${err.message}`);
      for (const detail of err.details) {
        console.error(`  ${detail}`);
      }
    } else {
      console.error('Error:', err);
    }
    process.exit(1);
  });
