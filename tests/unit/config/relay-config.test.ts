/**
 * Relay configuration tests
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_SOCKET_PATH,
  loadRelayConfig,
  parseBooleanEnv,
  readConfigFile,
  readEnvConfig,
  resolveEndpoint,
  validateRelayConfig,
} from '../../../src/config/relay-config.js';
import { ErrorType, OAuthRelayError } from '../../../src/types/errors.js';

describe('relay-config', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'relay-config-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const path = join(tempDir, 'config.json');
    await writeFile(path, content);
    return path;
  }

  describe('validateRelayConfig', () => {
    it('should fill in defaults', () => {
      expect(validateRelayConfig({})).toEqual({
        callbackPath: '/oauth/callback',
        httpHost: '127.0.0.1',
        httpPort: 8000,
        codeKeys: ['code', 'authorization_code'],
        socketPath: DEFAULT_SOCKET_PATH,
        tcpHost: '127.0.0.1',
        tcpPort: 9999,
        useTcp: false,
        defaultTimeoutMs: 300000,
        logUnmatched: true,
        registrationTimeoutMs: 10000,
      });
    });

    it('should list every invalid field', () => {
      try {
        validateRelayConfig({ callbackPath: 'no-slash', httpPort: 70000 });
        throw new Error('Expected validation to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(OAuthRelayError);
        expect(error).toMatchObject({ type: ErrorType.CONFIG_ERROR, code: 'CONFIG_INVALID' });
        expect(error).toHaveProperty('details', [
          'callbackPath: callbackPath must start with "/"',
          'httpPort: Number must be less than or equal to 65535',
        ]);
      }
    });

    it('should reject an empty code key list', () => {
      expect(() => validateRelayConfig({ codeKeys: [] })).toThrow('Invalid relay configuration: codeKeys');
    });
  });

  describe('parseBooleanEnv', () => {
    it('should accept common spellings', () => {
      expect(parseBooleanEnv('true')).toBe(true);
      expect(parseBooleanEnv('YES')).toBe(true);
      expect(parseBooleanEnv('1')).toBe(true);
      expect(parseBooleanEnv('off')).toBe(false);
      expect(parseBooleanEnv('0')).toBe(false);
    });

    it('should pass anything else through for validation', () => {
      expect(parseBooleanEnv('maybe')).toBe('maybe');
    });
  });

  describe('readEnvConfig', () => {
    it('should convert numbers, booleans and lists', () => {
      expect(
        readEnvConfig({
          OAUTH_RELAY_HTTP_PORT: '8080',
          OAUTH_RELAY_USE_TCP: 'true',
          OAUTH_RELAY_CODE_KEYS: 'code, token ,',
          OAUTH_RELAY_CALLBACK_PATH: '/cb',
        })
      ).toEqual({
        httpPort: 8080,
        useTcp: true,
        codeKeys: ['code', 'token'],
        callbackPath: '/cb',
      });
    });

    it('should leave unparsable numbers for validation to report', () => {
      expect(readEnvConfig({ OAUTH_RELAY_TCP_PORT: 'abc' })).toEqual({ tcpPort: 'abc' });
      expect(() => validateRelayConfig(readEnvConfig({ OAUTH_RELAY_TCP_PORT: 'abc' }))).toThrow(
        'Invalid relay configuration: tcpPort'
      );
    });

    it('should ignore unrelated variables', () => {
      expect(readEnvConfig({ PATH: '/usr/bin' })).toEqual({});
    });
  });

  describe('readConfigFile', () => {
    it('should read known settings and ignore unknown keys', async () => {
      const path = await writeConfig(JSON.stringify({ httpPort: 9000, unknown: 'x' }));

      await expect(readConfigFile(path)).resolves.toEqual({ httpPort: 9000 });
    });

    it('should report a missing file', async () => {
      await expect(readConfigFile(join(tempDir, 'missing.json'))).rejects.toMatchObject({
        code: 'CONFIG_NOT_FOUND',
      });
    });

    it('should report invalid JSON', async () => {
      const path = await writeConfig('{ not json');

      await expect(readConfigFile(path)).rejects.toMatchObject({ code: 'CONFIG_INVALID_JSON' });
    });

    it('should require a JSON object', async () => {
      const path = await writeConfig('[1, 2]');

      await expect(readConfigFile(path)).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
    });
  });

  describe('loadRelayConfig', () => {
    it('should layer file, environment and overrides', async () => {
      const path = await writeConfig(
        JSON.stringify({ httpPort: 9000, httpHost: '127.0.0.2', callbackPath: '/file' })
      );

      const config = await loadRelayConfig({
        configPath: path,
        env: { OAUTH_RELAY_HTTP_PORT: '9100', OAUTH_RELAY_HTTP_HOST: '127.0.0.3' },
        overrides: { httpPort: 9200, httpHost: undefined },
      });

      expect(config.callbackPath).toBe('/file');
      expect(config.httpHost).toBe('127.0.0.3');
      expect(config.httpPort).toBe(9200);
    });

    it('should read the file named by OAUTH_RELAY_CONFIG_PATH', async () => {
      const path = await writeConfig(JSON.stringify({ tcpPort: 7000 }));

      const config = await loadRelayConfig({ env: { OAUTH_RELAY_CONFIG_PATH: path } });

      expect(config.tcpPort).toBe(7000);
    });

    it('should use defaults with an empty environment', async () => {
      const config = await loadRelayConfig({ env: {} });

      expect(config.httpPort).toBe(8000);
      expect(config.socketPath).toBe(DEFAULT_SOCKET_PATH);
    });
  });

  describe('resolveEndpoint', () => {
    const config = validateRelayConfig({ socketPath: '/tmp/test.sock', tcpPort: 9123 });

    it('should use the unix socket by default', () => {
      expect(resolveEndpoint(config, 'linux')).toEqual({ type: 'unix', path: '/tmp/test.sock' });
    });

    it('should use TCP when forced', () => {
      expect(resolveEndpoint({ ...config, useTcp: true }, 'darwin')).toEqual({
        type: 'tcp',
        host: '127.0.0.1',
        port: 9123,
      });
    });

    it('should always use TCP on Windows', () => {
      expect(resolveEndpoint(config, 'win32')).toEqual({ type: 'tcp', host: '127.0.0.1', port: 9123 });
    });
  });
});
