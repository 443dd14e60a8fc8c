import { PassThrough } from 'node:stream';

import { afterEach, describe, expect, it } from 'vitest';

import { configureLogging, getLogger, resetLogging } from '../src/logger';

describe('logging', () => {
  afterEach(async () => {
    await resetLogging();
  });

  it('writes formatted lines under the motorpool category at or above the level', async () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
    await configureLogging({ level: 'info', stream });

    const logger = getLogger('gateway');
    logger.debug`hidden`;
    logger.warn`Call ${'c-1'} failed`;

    await new Promise((resolve) => setImmediate(resolve));
    const output = chunks.join('');
    expect(output).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[motorpool\.gateway\] WARNING Call c-1 failed\n$/,
    );
  });
});
