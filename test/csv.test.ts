import { describe, it, expect } from 'vitest';
import { bankToCsv, escapeCsv, momoToCsv, renderCorpusFiles } from '../src/utils/csv';
import type { BankTransaction, MomoTransaction } from '../src/types/transaction';

const MOMO: MomoTransaction = {
  transaction_id: 'MOMO-TXN-123456',
  timestamp: Date.UTC(2024, 1, 14, 22, 5, 9),
  sender_account: 'MOMO-GH-00012',
  receiver_account: 'MOMO-ATK-54321',
  amount_ghs: 1400,
  transaction_type: 'send',
  channel: 'ussd',
  agent_id: null,
  merchant_category: 'unknown',
  location_region: 'Greater Accra',
  device_id: 'DEV-0a1b2c',
  is_new_device: true,
  otp_requested: true,
  linked_bank_account: null,
  income_tier: 'low',
  personal_alert_threshold: 1200,
  label: 1,
  attack_type: 'otp_phishing',
};

const BANK: BankTransaction = {
  transaction_id: 'BANK-TXN-654321',
  timestamp: Date.UTC(2024, 1, 16, 3, 0, 0),
  account_id: 'BANK-GH-00012',
  linked_momo_account: 'MOMO-GH-00012',
  amount_ghs: 250.5,
  transaction_type: 'transfer',
  channel: 'momo',
  counterparty_account: 'MOMO-GH-00012',
  balance_before_ghs: 3000,
  balance_after_ghs: 2749.5,
  location_region: 'Brong-Ahafo',
  is_after_hours: true,
  income_tier: 'middle',
  personal_alert_threshold: 2700.75,
  label: 0,
  attack_type: 'none',
};

describe('escapeCsv', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsv('Greater Accra')).toBe('Greater Accra');
  });

  it('quotes delimiters, quotes and line breaks', () => {
    expect(escapeCsv('a,b')).toBe('"a,b"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('momoToCsv', () => {
  it('writes the header and one row per record', () => {
    expect(momoToCsv([MOMO])).toBe(
      'transaction_id,timestamp,sender_account,receiver_account,amount_ghs,transaction_type,channel,' +
        'agent_id,merchant_category,location_region,device_id,is_new_device,otp_requested,' +
        'linked_bank_account,income_tier,personal_alert_threshold,label,attack_type\n' +
        'MOMO-TXN-123456,2024-02-14T22:05:09.000Z,MOMO-GH-00012,MOMO-ATK-54321,1400.00,send,ussd,' +
        ',unknown,Greater Accra,DEV-0a1b2c,true,true,,low,1200.00,1,otp_phishing\n'
    );
  });

  it('writes only the header for an empty table', () => {
    expect(momoToCsv([]).split('\n')).toHaveLength(2);
  });
});

describe('bankToCsv', () => {
  it('formats currency with two decimals and flags as true/false', () => {
    const [header, row] = bankToCsv([BANK]).split('\n');
    expect(header).toBe(
      'transaction_id,timestamp,account_id,linked_momo_account,amount_ghs,transaction_type,channel,' +
        'counterparty_account,balance_before_ghs,balance_after_ghs,location_region,is_after_hours,' +
        'income_tier,personal_alert_threshold,label,attack_type'
    );
    expect(row).toBe(
      'BANK-TXN-654321,2024-02-16T03:00:00.000Z,BANK-GH-00012,MOMO-GH-00012,250.50,transfer,momo,' +
        'MOMO-GH-00012,3000.00,2749.50,Brong-Ahafo,true,middle,2700.75,0,none'
    );
  });
});

describe('renderCorpusFiles', () => {
  it('names both tables', () => {
    const files = renderCorpusFiles({ momo: [MOMO], bank: [BANK] });
    expect(files.map((f) => [f.channel, f.name])).toEqual([
      ['momo', 'momo_transactions.csv'],
      ['bank', 'bank_transactions.csv'],
    ]);
  });
});
