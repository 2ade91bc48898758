import { describe, test, before, after } from 'node:test';
import assert from 'node:assert';
import path from 'node:path';

import { createInstallLogger, levelToNumber } from '../../scripts/install/logger.js';
import { createTempWorkspace, cleanupTempWorkspace, readLogRecords } from './helpers.js';

describe('install logger', () => {
  let tmp: string;

  before(async () => {
    tmp = await createTempWorkspace('hdl21-installer-logger-');
  });

  after(async () => {
    await cleanupTempWorkspace(tmp);
  });

  test('creates parent directories and appends one JSON record per call', () => {
    const filePath = path.join(tmp, 'nested', 'logs', 'install.log');
    const logger = createInstallLogger({ filePath });

    logger.info('install.start');
    logger.error({ step: 'clone Vlsir', exitCode: 128 }, 'install.step.failed');

    const records = readLogRecords(filePath);
    assert.strictEqual(records.length, 2);

    assert.strictEqual(records[0].level, 30);
    assert.strictEqual(records[0].msg, 'install.start');
    assert.strictEqual(typeof records[0].time, 'number');

    assert.strictEqual(records[1].level, 50);
    assert.strictEqual(records[1].msg, 'install.step.failed');
    assert.strictEqual(records[1].step, 'clone Vlsir');
    assert.strictEqual(records[1].exitCode, 128);
  });

  test('fields without a message log an empty msg', () => {
    const filePath = path.join(tmp, 'fields-only.log');
    const logger = createInstallLogger({ filePath });

    logger.warn({ planId: 'dev' });

    const [record] = readLogRecords(filePath);
    assert.strictEqual(record.level, 40);
    assert.strictEqual(record.msg, '');
    assert.strictEqual(record.planId, 'dev');
  });

  test('child loggers stamp their bindings on every record', () => {
    const filePath = path.join(tmp, 'child.log');
    const plan = createInstallLogger({ filePath, bindings: { planId: 'sky130-pdk' } });
    const step = plan.child({ step: 'build open_pdks', stepNum: 3 });

    plan.info('install.start');
    step.error({ exitCode: 2 }, 'install.step.failed');
    step.warn({ stepNum: 4 }, 'install.interrupted');

    const records = readLogRecords(filePath);
    assert.deepStrictEqual(
      records.map(({ level, msg, planId, step: name, stepNum }) => ({ level, msg, planId, name, stepNum })),
      [
        { level: 30, msg: 'install.start', planId: 'sky130-pdk', name: undefined, stepNum: undefined },
        { level: 50, msg: 'install.step.failed', planId: 'sky130-pdk', name: 'build open_pdks', stepNum: 3 },
        { level: 40, msg: 'install.interrupted', planId: 'sky130-pdk', name: 'build open_pdks', stepNum: 4 }
      ]
    );
    assert.strictEqual(records[1].exitCode, 2);
  });

  test('uses pino numeric levels', () => {
    assert.deepStrictEqual(
      (['debug', 'info', 'warn', 'error'] as const).map(levelToNumber),
      [20, 30, 40, 50]
    );
  });
});
