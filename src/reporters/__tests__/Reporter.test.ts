import * as fc from 'fast-check';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs';
import winston from 'winston';
import { Reporter } from '../Reporter';
import { CleanupRunResult, KindOutcome, RESOURCE_KINDS } from '../../types';
import { createStats } from '../../cleaners';

// Mock winston
jest.mock('winston', () => ({
  createLogger: jest.fn(() => ({
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn()
  })),
  format: {
    combine: jest.fn(),
    timestamp: jest.fn(),
    errors: jest.fn(),
    json: jest.fn(),
    colorize: jest.fn(),
    simple: jest.fn()
  },
  transports: {
    File: jest.fn(),
    Console: jest.fn()
  }
}));

const startedAt = new Date('2026-01-02T03:04:05.000Z');

describe('Reporter', () => {
  const logPath = path.join(os.tmpdir(), 'aws-gc-reporter-test');

  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterAll(() => {
    fs.rmSync(logPath, { recursive: true, force: true });
  });

  it('should create the log directory and both log files', () => {
    new Reporter({ verbose: false, logPath });

    expect(fs.existsSync(logPath)).toBe(true);
    const files = jest.mocked(winston.transports.File).mock.calls.map(call => call[0]?.filename);
    expect(files).toEqual([path.join(logPath, 'gc.log'), path.join(logPath, 'gc-error.log')]);
  });

  it('should log at debug level when verbose', () => {
    new Reporter({ verbose: true, logPath });
    new Reporter({ verbose: false, logPath });

    const levels = jest.mocked(winston.createLogger).mock.calls.map(call => call[0]?.level);
    expect(levels).toEqual(['debug', 'info']);
  });

  it('should map the logging sink onto winston levels', () => {
    const reporter = new Reporter({ verbose: true, logPath });
    const logger = reporter.getLogger();

    reporter.log('marked eni-1');
    reporter.debug('skipping eni-2');
    reporter.warning('wait timed out');
    reporter.error('delete failed');

    expect(logger.info).toHaveBeenCalledWith('marked eni-1');
    expect(logger.debug).toHaveBeenCalledWith('skipping eni-2');
    expect(logger.warn).toHaveBeenCalledWith('wait timed out');
    expect(logger.error).toHaveBeenCalledWith('delete failed');
  });

  it('should log the start of a run with its scope', () => {
    const reporter = new Reporter({ verbose: false, logPath });

    reporter.logRunStart('commit', { session: { region: 'eu-west-1', profile: 'sandbox' }, ignoreTag: 'keep' });

    expect(reporter.getLogger().info).toHaveBeenCalledWith('Starting commit cleanup', expect.objectContaining({
      mode: 'commit',
      region: 'eu-west-1',
      profile: 'sandbox',
      ignoreTag: 'keep'
    }));
  });

  describe('generateSummary', () => {
    it('should list every resource kind with its counters', () => {
      const reporter = new Reporter({ verbose: false, logPath });
      const result: CleanupRunResult = {
        mode: 'commit',
        region: 'eu-west-1',
        startedAt,
        executionTime: 1234,
        outcomes: [
          {
            kind: 'load-balancer',
            success: true,
            stats: { ...createStats(), scanned: 3, ignored: 1, marked: 1, contextFailures: 1, pendingDeletion: 1, deleted: 1 }
          },
          { kind: 'vpc', success: false, error: 'failed getting list of vpc resources: AuthFailure' }
        ]
      };

      expect(reporter.generateSummary(result).split('\n')).toEqual([
        '=== AWS Resource GC Report (COMMIT) ===',
        'Region: eu-west-1',
        'Started: 2026-01-02T03:04:05.000Z',
        'Execution Time: 1.23s',
        '',
        'RESOURCE KINDS:',
        '  load-balancer: scanned 3, ignored 1, excluded 0, marked 1, pending deletion 1, deleted 1, failures 1',
        '  vpc: FAILED (failed getting list of vpc resources: AuthFailure)',
        '',
        'Kinds Failed: 1/2'
      ]);
    });

    it('should omit the kind section for an empty run', () => {
      const reporter = new Reporter({ verbose: false, logPath });

      const summary = reporter.generateSummary({
        mode: 'dry-run',
        region: 'us-east-1',
        startedAt,
        executionTime: 0,
        outcomes: []
      });

      expect(summary.split('\n')).toEqual([
        '=== AWS Resource GC Report (DRY-RUN) ===',
        'Region: us-east-1',
        'Started: 2026-01-02T03:04:05.000Z',
        'Execution Time: 0.00s',
        '',
        'Kinds Failed: 0/0'
      ]);
    });
  });
});

describe('Reporter Property Tests', () => {
  const outcomeArbitrary: fc.Arbitrary<KindOutcome> = fc.record({
    kind: fc.constantFrom(...RESOURCE_KINDS),
    success: fc.boolean(),
    error: fc.string({ minLength: 1, maxLength: 20 }).filter(error => !error.includes('\n'))
  }).map(({ kind, success, error }) => success
    ? { kind, success, stats: createStats() }
    : { kind, success, error });

  it('should count failed kinds and give one line per kind', () => {
    const reporter = new Reporter({ verbose: false, logPath: path.join(os.tmpdir(), 'aws-gc-reporter-test') });

    fc.assert(
      fc.property(fc.array(outcomeArbitrary, { maxLength: 6 }), fc.nat({ max: 300000 }), (outcomes, executionTime) => {
        const lines = reporter.generateSummary({ mode: 'commit', region: 'us-east-1', startedAt, executionTime, outcomes }).split('\n');
        const failed = outcomes.filter(outcome => !outcome.success).length;

        expect(lines[lines.length - 1]).toBe(`Kinds Failed: ${failed}/${outcomes.length}`);
        expect(lines.filter(line => line.startsWith('  ')).length).toBe(outcomes.length);
      }),
      { numRuns: 100 }
    );
  });
});
