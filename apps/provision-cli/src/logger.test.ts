import { afterEach, describe, it, expect } from 'vitest';
import chalk, { chalkStderr } from 'chalk';
import { createCliLogger } from './logger.js';

const stdoutLevel = chalk.level;
const stderrLevel = chalkStderr.level;

afterEach(() => {
  chalk.level = stdoutLevel;
  chalkStderr.level = stderrLevel;
});

const collect = (level: 'debug' | 'info' | 'warn' | 'error') => {
  const lines: string[] = [];
  const logger = createCliLogger(level, (line) => {
    lines.push(line);
  });
  return { lines, logger };
};

describe('createCliLogger', () => {
  it('colours by what standard error supports, not standard output', () => {
    chalk.level = 0;
    chalkStderr.level = 1;
    const { lines, logger } = collect('info');

    logger.info('Using recovery flow default-recovery-flow');

    expect(lines).toEqual(['\u001b[36m[idp-provision] Using recovery flow default-recovery-flow\u001b[39m']);
  });

  it('writes plain lines when standard error takes no colour', () => {
    chalk.level = 1;
    chalkStderr.level = 0;
    const { lines, logger } = collect('info');

    logger.child('zitadel').warn('TLS certificate verification is disabled');

    expect(lines).toEqual(['[idp-provision:zitadel] TLS certificate verification is disabled']);
  });

  it('keeps debug lines back unless asked for', () => {
    chalkStderr.level = 0;
    const { lines, logger } = collect('info');

    logger.debug('Authentik answered 503, retrying in 5000ms');

    expect(lines).toEqual([]);
  });
});
