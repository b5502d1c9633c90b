import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { ConfigurationManager, DEFAULT_CONNECTION_CONFIG } from '@core/config/ConfigurationManager';
import { UsageError } from '@core/errors';

describe('ConfigurationManager', () => {
  let manager: ConfigurationManager;
  let dir: string;

  beforeEach(() => {
    manager = ConfigurationManager.getInstance();
    manager.reset();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'zapctl-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should be a singleton', () => {
    expect(ConfigurationManager.getInstance()).toBe(manager);
  });

  it('should use the defaults when nothing is given', () => {
    expect(manager.loadFromObject()).toEqual(DEFAULT_CONNECTION_CONFIG);
  });

  it('should let later sources win and skip undefined values', () => {
    const config = manager.loadFromObject({ port: 8080, zapPath: '/opt/zap' }, { port: 9090, zapPath: undefined });

    expect(config.port).toBe(9090);
    expect(config.zapPath).toBe('/opt/zap');
    expect(manager.getConfig()).toBe(config);
  });

  it('should reject an invalid port', () => {
    expect(() => manager.loadFromObject({ port: 70000 })).toThrow(
      'Invalid configuration: Port must be an integer between 1 and 65535, got 70000'
    );
  });

  it('should reject a non-http URL', () => {
    expect(() => manager.loadFromObject({ zapUrl: 'ftp://127.0.0.1' })).toThrow(UsageError);
  });

  it('should complain before anything is loaded', () => {
    expect(() => manager.getConfig()).toThrow('No configuration loaded. Load a configuration first.');
  });

  describe('loadFromFile', () => {
    it('should read the known fields', () => {
      const file = path.join(dir, 'zap.json');
      fs.writeFileSync(
        file,
        JSON.stringify({ zapPath: '/opt/zap', port: '8091', apiKey: 'test-secret', softFail: true, extra: 1 })
      );

      expect(manager.loadFromFile(file)).toEqual({
        zapPath: '/opt/zap',
        port: 8091,
        apiKey: 'test-secret',
        softFail: true,
      });
    });

    it('should reject a missing file', () => {
      expect(() => manager.loadFromFile(path.join(dir, 'missing.json'))).toThrow(UsageError);
    });

    it('should reject malformed JSON', () => {
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, '{ port: ');
      expect(() => manager.loadFromFile(file)).toThrow(/^Cannot parse configuration file/);
    });

    it('should reject a non-numeric port', () => {
      const file = path.join(dir, 'port.json');
      fs.writeFileSync(file, JSON.stringify({ port: 'eighty' }));
      expect(() => manager.loadFromFile(file)).toThrow('Configuration field "port" must be a number, got eighty');
    });
  });
});
