/**
 * Tests for configuration defaults, validation and environment loading
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors/index.js';
import { createDefaultConfig } from './defaults.js';
import { createConfigFromEnv } from './env.js';
import { normalizeConfig, validateConfig } from './validation.js';

describe('createDefaultConfig', () => {
  it('should use the documented defaults', () => {
    expect(createDefaultConfig()).toEqual({
      endpoint: 'dynamodb.us-east-1.amazonaws.com',
      protocol: 'https',
      region: 'us-east-1',
      service: 'dynamodb',
      maxErrorRetry: 3,
      initialBackoffMs: 10,
      uploadBlockSize: 524288,
      timeout: 60000,
      jsonContentType: 'application/x-amz-json-1.1',
      errorTypePrefix: 'com.amazon.coral.service#',
      logLevel: 'warn',
    });
  });
});

describe('normalizeConfig', () => {
  it('should derive the endpoint from service and region', () => {
    const config = normalizeConfig({ service: 'kinesis', region: 'eu-west-1' });
    expect(config.endpoint).toBe('kinesis.eu-west-1.amazonaws.com');
  });

  it('should keep defaults for settings passed as undefined', () => {
    const config = normalizeConfig({ maxErrorRetry: undefined, timeout: undefined, region: 'eu-west-1' });

    expect(config.maxErrorRetry).toBe(3);
    expect(config.timeout).toBe(60000);
    expect(config.endpoint).toBe('dynamodb.eu-west-1.amazonaws.com');
  });

  it('should split an endpoint URL into protocol and host', () => {
    const config = normalizeConfig({ endpoint: 'http://localhost:8000/' });

    expect(config.protocol).toBe('http');
    expect(config.endpoint).toBe('localhost:8000');
  });

  it('should keep explicit values', () => {
    const config = normalizeConfig({ maxErrorRetry: 0, uploadBlockSize: 65536 });

    expect(config.maxErrorRetry).toBe(0);
    expect(config.uploadBlockSize).toBe(65536);
  });

  it('should reject a block size of 8 KiB or less', () => {
    expect(() => normalizeConfig({ uploadBlockSize: 8192 })).toThrow(ConfigError);
  });

  it('should list every invalid field', () => {
    try {
      normalizeConfig({ maxErrorRetry: -1, region: '' });
      expect.fail('expected a ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: 'INVALID_CONFIG' });
      if (error instanceof ConfigError) {
        expect(error.serviceMessage).toContain('maxErrorRetry:');
        expect(error.serviceMessage).toContain('region:');
      }
    }
  });
});

describe('validateConfig', () => {
  it('should return a valid configuration unchanged', () => {
    const config = createDefaultConfig();
    expect(validateConfig(config)).toBe(config);
  });

  it('should reject an endpoint with a path', () => {
    expect(() => validateConfig({ ...createDefaultConfig(), endpoint: 'host/path' })).toThrow(
      ConfigError
    );
  });
});

describe('createConfigFromEnv', () => {
  it('should read every supported variable', () => {
    const config = createConfigFromEnv(
      {},
      {
        AWS_REGION: 'eu-central-1',
        AWS_SERVICE: 'kinesis',
        AWS_ENDPOINT: 'https://kinesis.local',
        AWS_MAX_ERROR_RETRY: '5',
        AWS_UPLOAD_BLOCK_SIZE: '65536',
        AWS_TIMEOUT_MS: '1500',
      }
    );

    expect(config).toMatchObject({
      region: 'eu-central-1',
      service: 'kinesis',
      endpoint: 'kinesis.local',
      protocol: 'https',
      maxErrorRetry: 5,
      uploadBlockSize: 65536,
      timeout: 1500,
    });
  });

  it('should fall back to AWS_DEFAULT_REGION', () => {
    const config = createConfigFromEnv({}, { AWS_DEFAULT_REGION: 'ap-south-1' });

    expect(config.region).toBe('ap-south-1');
    expect(config.endpoint).toBe('dynamodb.ap-south-1.amazonaws.com');
  });

  it('should let overrides win over the environment', () => {
    const config = createConfigFromEnv({ region: 'us-west-2' }, { AWS_REGION: 'eu-west-1' });
    expect(config.region).toBe('us-west-2');
  });

  it('should reject a malformed number', () => {
    expect(() => createConfigFromEnv({}, { AWS_MAX_ERROR_RETRY: 'three' })).toThrow(
      "AWS_MAX_ERROR_RETRY must be a non-negative integer, got 'three'"
    );
  });
});
