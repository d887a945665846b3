import { beforeEach, describe, expect, it } from 'vitest';
import { CanonicalCsvValidator } from '../../src/application/services/CanonicalCsvValidator.js';
import { DeduplicationService } from '../../src/application/services/DeduplicationService.js';
import { LedgerService } from '../../src/application/services/LedgerService.js';
import { TransactionImportService } from '../../src/application/services/TransactionImportService.js';
import { InMemoryTransactionStore } from '../../src/infrastructure/adapters/storage/InMemoryTransactionStore.js';
import { CANONICAL_HEADER, testMultipliers } from '../support.js';

describe('LedgerService', () => {
  let ledger: LedgerService;

  beforeEach(async () => {
    const store = new InMemoryTransactionStore(testMultipliers);
    const importer = new TransactionImportService(store, new CanonicalCsvValidator(), new DeduplicationService());
    ledger = new LedgerService(store);

    await importer.importCsv(
      [
        CANONICAL_HEADER,
        '2024-03-01,STARBUCKS,4.50,Dining,amex',
        '2024-03-02,AUTOPAY THANK YOU,250.00,Payment,amex',
        '2024-03-03,Corner Bistro,20.25,Dining,amex',
        '2024-03-04,Hardware,0.10,,amex',
      ].join('\n'),
      { ownerId: 'household' },
    );
    await importer.importCsv([CANONICAL_HEADER, '2024-03-05,Guest Lunch,9.99,Dining,amex'].join('\n'), {
      ownerId: 'guest',
    });
  });

  it('totals spend and points for one owner, counting missing points as zero', async () => {
    await expect(ledger.summarize('household')).resolves.toEqual({ totalSpent: 274.85, totalPoints: 72 });
  });

  it('pages transactions newest first', async () => {
    const page = await ledger.listTransactions('household', { skip: 1, limit: 2 });
    expect(page.map((txn) => txn.description)).toEqual(['Corner Bistro', 'AUTOPAY THANK YOU']);
  });

  it('defaults to the first hundred rows and clamps negative paging', async () => {
    expect(await ledger.listTransactions('household')).toHaveLength(4);
    expect(await ledger.listTransactions('household', { skip: -5, limit: -1 })).toEqual([]);
  });

  it('lists the multiplier table', async () => {
    await expect(ledger.listMultipliers()).resolves.toEqual(testMultipliers);
  });
});
