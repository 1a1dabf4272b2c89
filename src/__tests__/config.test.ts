import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_BASE_URL, loadConfig, toLogLevel } from '../config.js';
import { ConfigError } from '../lib/errors.js';

describe('loadConfig', () => {
  let dir: string;

  const writeConfig = async (content: unknown, name = 'config.json') => {
    const filePath = path.join(dir, name);
    await writeFile(filePath, typeof content === 'string' ? content : JSON.stringify(content));
    return filePath;
  };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'harvester-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fills in defaults for a minimal file', async () => {
    const config = await loadConfig(await writeConfig({ output_directory: dir, start_date: '01-01-2021' }), {});

    expect(config).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      outputDirectory: dir,
      outputFormat: 'csv',
      startDate: new Date(Date.UTC(2021, 0, 1)),
      endDate: null,
      thresholdDays: 1,
      limit: 50,
      maxArticles: null,
      maxAttempts: 3,
      backoffBaseMs: 1000,
      requestTimeoutMs: 10000,
      minSleepSeconds: 0,
      maxSleepSeconds: 0,
      onError: 'skip',
      maxErrors: 10,
      dedupe: true,
      authToken: null,
      logLevel: 'info',
      logDirectory: null,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('accepts the description/value layout and numeric log levels', async () => {
    const config = await loadConfig(
      await writeConfig({
        output_directory: { description: 'Where to write', value: dir },
        start_date: { description: 'First day', value: '05-03-2020' },
        end_date: { description: 'Last day', value: null },
        threshold: { description: 'Days per request', value: '7' },
        log_level: { description: 'Python-style level', value: 30 },
        total: { description: 'Ignored', value: 120 },
      }),
      {}
    );

    expect(config.startDate).toEqual(new Date(Date.UTC(2020, 2, 5)));
    expect(config.endDate).toBeNull();
    expect(config.thresholdDays).toBe(7);
    expect(config.logLevel).toBe('warn');
  });

  it('lets the environment override the token and log level', async () => {
    const filePath = await writeConfig({
      output_directory: dir,
      start_date: '01-01-2021',
      auth_token: 'file-token',
      log_level: 'error',
    });

    const config = await loadConfig(filePath, { API_TOKEN: 'test-token', LOG_LEVEL: 'debug' });

    expect(config.authToken).toBe('test-token');
    expect(config.logLevel).toBe('debug');
    await expect(loadConfig(filePath, { API_TOKEN: '' })).resolves.toMatchObject({
      authToken: 'file-token',
      logLevel: 'error',
    });
  });

  it('resolves relative directories against the config file', async () => {
    await mkdir(path.join(dir, 'out'));
    await mkdir(path.join(dir, 'logs'));

    const config = await loadConfig(
      await writeConfig({ output_directory: 'out', log_directory: './logs', start_date: '01-01-2021' }),
      {}
    );

    expect(config.outputDirectory).toBe(path.join(dir, 'out'));
    expect(config.logDirectory).toBe(path.join(dir, 'logs'));
  });

  it.each<[unknown, RegExp]>([
    [{ start_date: '01-01-2021' }, /output_directory: Required/],
    [{ output_directory: 'missing', start_date: '01-01-2021' }, /doesn't exist/],
    [{ output_directory: 'x', start_date: '2021-01-01' }, /start_date: expected DD-MM-YYYY, got "2021-01-01"/],
    [{ output_directory: 'x', start_date: '02-01-2021', end_date: '01-01-2021' }, /end_date: must be after start_date/],
    [{ output_directory: 'x', start_date: '01-01-2021', min_sleep_time: 5, max_sleep_time: 1 }, /max_sleep_time/],
    [{ output_directory: 'x', start_date: '01-01-2021', on_error: 'retry' }, /on_error/],
    [{ output_directory: 'x', start_date: '01-01-2021', limit: 0 }, /limit/],
  ])('rejects %j', async (content, message) => {
    const filePath = await writeConfig(content);
    await expect(loadConfig(filePath, {})).rejects.toThrow(message);
    await expect(loadConfig(filePath, {})).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects an output path that is a file', async () => {
    await writeFile(path.join(dir, 'out.txt'), '');
    const filePath = await writeConfig({ output_directory: 'out.txt', start_date: '01-01-2021' });

    await expect(loadConfig(filePath, {})).rejects.toThrow(/is not a directory/);
  });

  it('rejects files that are missing, not json, or not parseable', async () => {
    await expect(loadConfig(path.join(dir, 'absent.json'), {})).rejects.toThrow(/Config file not found/);
    await expect(loadConfig(await writeConfig('{}', 'config.yaml'), {})).rejects.toThrow(/is not a json file/);
    await expect(loadConfig(await writeConfig('{ nope', 'broken.json'), {})).rejects.toThrow(/is not valid JSON/);
  });
});

describe('toLogLevel', () => {
  it('maps numeric levels onto names', () => {
    expect([10, 20, 30, 40, 50].map(toLogLevel)).toEqual(['debug', 'info', 'warn', 'error', 'error']);
    expect(toLogLevel('warn')).toBe('warn');
  });
});
