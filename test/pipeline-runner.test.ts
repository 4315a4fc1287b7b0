import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';
import { describe, it } from 'node:test';
import { StoreUnavailableError } from '../src/errors.js';
import { runPipeline } from '../src/services/pipeline-runner.js';
import { readCsvRecords } from '../src/sources/csv-source.js';
import type { FlatRecord } from '../src/types.js';
import { MemoryDatabase } from './support/memory-store.js';
import { flatRecord, pipelineConfig } from './support/records.js';

const samplePath = fileURLToPath(new URL('./fixtures/shopping_sample.csv', import.meta.url));

function threeRecords(): FlatRecord[] {
  return [
    flatRecord({ purchase_transaction_id: '1' }),
    flatRecord({
      purchase_transaction_id: '2',
      item_name: 'Boots',
      category: 'Footwear',
      size: 'L',
      color: 'Black',
      season: 'Fall',
      purchase_amount_usd: '120',
    }),
    flatRecord({ purchase_transaction_id: '3', customer_id: '9', age: '29', gender: 'Male', review_rating: '' }),
  ];
}

describe('runPipeline', () => {
  it('loads a star schema from flat records', async () => {
    const db = new MemoryDatabase();
    const report = await runPipeline(threeRecords(), db.connector(), pipelineConfig);

    assert.equal(report.status, 'Completed');
    assert.equal(report.stage, 'Completed');
    assert.equal(report.totalRecords, 3);
    assert.deepEqual(report.counts, { Dim_Customer: 2, Dim_Item: 2, Fact_Purchase: 3 });
    assert.deepEqual(report.storeCounts, { Dim_Customer: 2, Dim_Item: 2, Fact_Purchase: 3 });
    assert.deepEqual(report.rejections, []);
    assert.equal(report.error, null);

    assert.deepEqual(
      db.rows('Dim_Customer').map((row) => [row.customer_id, row.age, row.gender]),
      [
        [5, 41, 'Female'],
        [9, 29, 'Male'],
      ]
    );
    assert.deepEqual(
      db.rows('Fact_Purchase').map((row) => [row.purchase_transaction_id, row.customer_id, row.item_name, row.review_rating]),
      [
        [1, 5, 'Scarf', '4.10'],
        [2, 5, 'Boots', '4.10'],
        [3, 9, 'Scarf', null],
      ]
    );
    assert.equal(db.openConnections, 0);
  });

  it('rejects a record with a negative amount and keeps only dimensions a fact references', async () => {
    const db = new MemoryDatabase();
    const records = [
      flatRecord({ purchase_transaction_id: '1' }),
      flatRecord({ purchase_transaction_id: '2', customer_id: '12', purchase_amount_usd: '-5' }),
    ];
    const report = await runPipeline(records, db.connector(), pipelineConfig);

    assert.equal(report.status, 'Completed');
    assert.deepEqual(report.rejections, [
      {
        kind: 'ValidationError',
        key: '2',
        reason: 'purchase_amount_usd: -5.00 is outside 0.00..99999999.99',
        recordIndex: 1,
      },
    ]);
    assert.deepEqual(report.counts, { Dim_Customer: 1, Dim_Item: 1, Fact_Purchase: 1 });
    assert.deepEqual(
      db.rows('Dim_Customer').map((row) => row.customer_id),
      [5]
    );
  });

  it('accounts for every record as a fact or a rejection', async () => {
    const db = new MemoryDatabase();
    const records = [
      flatRecord({ purchase_transaction_id: '1' }),
      flatRecord({ purchase_transaction_id: '1' }),
      flatRecord({ purchase_transaction_id: '3', customer_id: null }),
      flatRecord({ purchase_transaction_id: '4', customer_id: '7', age: 'old' }),
      flatRecord({ purchase_transaction_id: '5', customer_id: '6' }),
    ];
    const report = await runPipeline(records, db.connector(), pipelineConfig);

    assert.deepEqual(
      report.rejections.map(({ kind, key, recordIndex }) => [recordIndex, kind, key]),
      [
        [1, 'DuplicateFactKey', '1'],
        [2, 'MissingDimensionReference', '<missing>'],
        [3, 'ValidationError', '7'],
      ]
    );
    assert.equal(report.rejections[2].reason, 'age: "old" is not an integer between 0 and 2147483647');
    assert.equal(report.counts.Fact_Purchase + report.rejections.length, report.totalRecords);
    assert.deepEqual(report.counts, { Dim_Customer: 2, Dim_Item: 1, Fact_Purchase: 2 });
  });

  it('leaves the store unchanged when the same input is loaded twice', async () => {
    const db = new MemoryDatabase();
    const first = await runPipeline(threeRecords(), db.connector(), pipelineConfig);
    const afterFirst = db.snapshot();
    const second = await runPipeline(threeRecords(), db.connector(), pipelineConfig);

    assert.equal(second.status, 'Completed');
    assert.deepEqual(second.counts, first.counts);
    assert.deepEqual(second.storeCounts, first.storeCounts);
    assert.deepEqual(db.snapshot(), afterFirst);
    assert.equal(db.connects, 2);
    assert.equal(db.openConnections, 0);
  });

  it('fails before extracting when the store cannot be reached', async () => {
    const db = new MemoryDatabase();
    db.failConnect = new StoreUnavailableError('connect ECONNREFUSED 127.0.0.1:5432');
    const report = await runPipeline(threeRecords(), db.connector(), pipelineConfig);

    assert.equal(report.status, 'Failed');
    assert.equal(report.stage, 'NotStarted');
    assert.deepEqual(report.error, { kind: 'StoreUnavailable', message: 'connect ECONNREFUSED 127.0.0.1:5432' });
    assert.deepEqual(report.counts, { Dim_Customer: 0, Dim_Item: 0, Fact_Purchase: 0 });
    assert.equal(report.storeCounts, null);
  });

  it('fails the run on conflicting dimension attributes under the fail policy', async () => {
    const db = new MemoryDatabase();
    const records = [flatRecord({ age: '41' }), flatRecord({ age: '42' })];
    const report = await runPipeline(records, db.connector(), pipelineConfig);

    assert.equal(report.status, 'Failed');
    assert.equal(report.stage, 'Building');
    assert.deepEqual(report.error, {
      kind: 'ConsistencyViolation',
      message: 'Dim_Customer 5: age is 41 but record 1 has 42',
    });
    assert.deepEqual(db.calls, []);
    assert.equal(db.openConnections, 0);
  });

  it('keeps the later attributes under the override policy', async () => {
    const db = new MemoryDatabase();
    const records = [flatRecord({ age: '41' }), flatRecord({ age: '42' })];
    const report = await runPipeline(records, db.connector(), { ...pipelineConfig, conflictPolicy: 'override' });

    assert.equal(report.status, 'Completed');
    assert.deepEqual(report.warnings, ['Dim_Customer 5: age is 41 but record 1 has 42; keeping the later value']);
    assert.equal(db.rows('Dim_Customer')[0].age, 42);
  });

  it('does not let a rejected record change a dimension row under the override policy', async () => {
    const db = new MemoryDatabase();
    const records = [flatRecord({ age: '41' }), flatRecord({ age: '99', purchase_amount_usd: '-5' })];
    const report = await runPipeline(records, db.connector(), { ...pipelineConfig, conflictPolicy: 'override' });

    assert.equal(report.status, 'Completed');
    assert.deepEqual(
      report.rejections.map(({ kind, recordIndex }) => [recordIndex, kind]),
      [[1, 'ValidationError']]
    );
    assert.deepEqual(report.warnings, []);
    assert.equal(db.rows('Dim_Customer')[0].age, 41);
  });

  it('does not fail the run over a conflict carried only by a rejected record', async () => {
    const db = new MemoryDatabase();
    const records = [flatRecord({ age: '41' }), flatRecord({ age: '99', discount_applied: 'maybe' })];
    const report = await runPipeline(records, db.connector(), pipelineConfig);

    assert.equal(report.status, 'Completed');
    assert.equal(report.rejections.length, 1);
    assert.deepEqual(report.counts, { Dim_Customer: 1, Dim_Item: 1, Fact_Purchase: 1 });
    assert.equal(db.rows('Dim_Customer')[0].age, 41);
  });

  it('reports the stage and committed counts of a failed load', async () => {
    const db = new MemoryDatabase();
    db.beforeUpsert = (call) => {
      if (call.table === 'Fact_Purchase') throw new Error('disk full');
    };
    const report = await runPipeline(threeRecords(), db.connector(), pipelineConfig);

    assert.equal(report.status, 'Failed');
    assert.equal(report.stage, 'LoadingFacts');
    assert.deepEqual(report.error, { kind: 'CommitFailure', message: 'Fact_Purchase batch 1 failed: disk full' });
    assert.deepEqual(report.counts, { Dim_Customer: 2, Dim_Item: 2, Fact_Purchase: 0 });
    assert.equal(db.openConnections, 0);
  });

  it('stops when aborted', async () => {
    const db = new MemoryDatabase();
    const controller = new AbortController();
    controller.abort();
    const report = await runPipeline(threeRecords(), db.connector(), { ...pipelineConfig, signal: controller.signal });

    assert.equal(report.status, 'Failed');
    assert.equal(report.stage, 'Extracting');
    assert.deepEqual(report.error, { kind: 'RunAborted', message: 'aborted during Extracting' });
    assert.equal(db.openConnections, 0);
  });

  it('loads the sample CSV file end to end', async () => {
    const db = new MemoryDatabase();
    const report = await runPipeline(readCsvRecords(samplePath), db.connector(), pipelineConfig);

    assert.equal(report.status, 'Completed');
    assert.equal(report.totalRecords, 4);
    assert.deepEqual(report.counts, { Dim_Customer: 2, Dim_Item: 2, Fact_Purchase: 3 });
    assert.deepEqual(report.rejections, [
      {
        kind: 'ValidationError',
        key: '3',
        reason: 'purchase_amount_usd: -5.00 is outside 0.00..99999999.99',
        recordIndex: 3,
      },
    ]);
    const portland = db.rows('Dim_Customer').find((row) => row.customer_id === 9);
    assert.equal(portland?.location, 'Portland, Maine');
    assert.deepEqual(
      db.rows('Fact_Purchase').map((row) => [row.purchase_transaction_id, row.purchase_amount_usd, row.review_rating]),
      [
        [0, '42.00', '4.10'],
        [1, '120.00', '5.00'],
        [2, '38.50', '3.75'],
      ]
    );
  });
});
