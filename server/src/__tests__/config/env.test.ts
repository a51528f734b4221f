import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getConfig, validateConfig } from '../../config/env';

describe('validateConfig', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'renshuu-connect-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function dirs(): Record<string, string> {
    return { DATA_DIR: path.join(root, 'data'), LOGS_DIR: path.join(root, 'logs') };
  }

  it('should apply defaults', () => {
    const config = validateConfig(dirs());

    expect(config).toEqual({
      port: 8765,
      host: '127.0.0.1',
      nodeEnv: 'development',
      logLevel: 'info',
      dataDir: path.join(root, 'data'),
      logsDir: path.join(root, 'logs'),
      databasePath: path.join(root, 'data', 'renshuu_cache.db'),
      renshuuApiUrl: 'https://api.renshuu.org/v1/',
      renshuuTimeoutMs: 15000,
      rateLimitPerMinute: 300,
    });
  });

  it('should create the data and log directories', () => {
    validateConfig(dirs());

    expect(fs.statSync(path.join(root, 'data')).isDirectory()).toBe(true);
    expect(fs.statSync(path.join(root, 'logs')).isDirectory()).toBe(true);
  });

  it('should read overrides', () => {
    const config = validateConfig({
      ...dirs(),
      PORT: '9000',
      HOST: '0.0.0.0',
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      RENSHUU_API_URL: 'http://localhost:4000/api',
      RENSHUU_TIMEOUT_MS: '2000',
      RATE_LIMIT_PER_MINUTE: '10',
    });

    expect(config).toMatchObject({
      port: 9000,
      host: '0.0.0.0',
      nodeEnv: 'production',
      logLevel: 'debug',
      renshuuApiUrl: 'http://localhost:4000/api/',
      renshuuTimeoutMs: 2000,
      rateLimitPerMinute: 10,
    });
  });

  it('should reject invalid ports', () => {
    expect(() => validateConfig({ ...dirs(), PORT: '70000' })).toThrow(
      'Invalid PORT environment variable: "70000". Must be a number between 1 and 65535.'
    );
  });

  it('should reject invalid API URLs', () => {
    expect(() => validateConfig({ ...dirs(), RENSHUU_API_URL: 'ftp://example.com/' })).toThrow(
      'Invalid RENSHUU_API_URL: "ftp://example.com/" must use http or https.'
    );
    expect(() => validateConfig({ ...dirs(), RENSHUU_API_URL: 'not a url' })).toThrow(
      'Invalid RENSHUU_API_URL: "not a url" is not a URL.'
    );
  });

  it('should reject non-positive numbers', () => {
    expect(() => validateConfig({ ...dirs(), RENSHUU_TIMEOUT_MS: '0' })).toThrow(
      'Invalid RENSHUU_TIMEOUT_MS environment variable: "0". Must be a positive integer.'
    );
  });

  it('should fall back to info for unknown log levels', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(validateConfig({ ...dirs(), LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
    expect(warn).toHaveBeenCalledTimes(1);

    warn.mockRestore();
  });

  it('should reject a data path that is a file', () => {
    const file = path.join(root, 'occupied');
    fs.writeFileSync(file, '');

    expect(() => validateConfig({ ...dirs(), DATA_DIR: file })).toThrow(
      `DATA_DIR: Path exists but is not a directory: "${file}"`
    );
  });
});

describe('getConfig', () => {
  const saved = { DATA_DIR: process.env.DATA_DIR, LOGS_DIR: process.env.LOGS_DIR };
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'renshuu-connect-'));
  });

  afterEach(() => {
    for (const [name, value] of Object.entries(saved)) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should read the environment on first use and reuse the result', () => {
    process.env.DATA_DIR = path.join(root, 'data');
    process.env.LOGS_DIR = path.join(root, 'logs');

    const config = getConfig();

    expect(config.dataDir).toBe(path.join(root, 'data'));
    expect(fs.statSync(path.join(root, 'logs')).isDirectory()).toBe(true);
    expect(getConfig()).toBe(config);
  });
});
