import { describe, it, expect } from 'vitest';
import { MetadataError } from '../../src/engine/errors.js';
import { DEFAULT_TIMEOUT_SECONDS, MAX_TIMEOUT_SECONDS, parseBytes, parseMetadata, splitWords } from '../../src/engine/metadata.js';

describe('parseMetadata', () => {
  it('fills in defaults for an empty map', () => {
    expect(parseMetadata({})).toEqual({
      description: '',
      timeout: DEFAULT_TIMEOUT_SECONDS,
      allowedArchitectures: [],
      allowedPlatforms: [],
      requiredConfigs: [],
      requiredFiles: [],
      requiredPrograms: [],
      requiredMemory: 0,
      hasCleanup: false,
      custom: {},
    });
  });

  it('parses every known property', () => {
    const metadata = parseMetadata({
      description: 'Adds numbers',
      timeout: '30',
      allowed_architectures: 'x86_64  arm64',
      allowed_platforms: 'linux',
      required_configs: 'fast',
      required_files: '/etc/passwd',
      required_programs: 'sh /bin/ls',
      required_memory: '2M',
      required_user: 'unprivileged',
      has_cleanup: 'true',
      expected_failure: 'Known bug',
      'X-owner': 'team',
    });

    expect(metadata).toEqual({
      description: 'Adds numbers',
      timeout: 30,
      allowedArchitectures: ['x86_64', 'arm64'],
      allowedPlatforms: ['linux'],
      requiredConfigs: ['fast'],
      requiredFiles: ['/etc/passwd'],
      requiredPrograms: ['sh', '/bin/ls'],
      requiredMemory: 2 * 1024 * 1024,
      requiredUser: 'unprivileged',
      hasCleanup: true,
      expectedFailure: 'Known bug',
      custom: { 'X-owner': 'team' },
    });
  });

  it('rejects unknown properties', () => {
    expect(() => parseMetadata({ color: 'red' })).toThrow(new MetadataError("Unknown metadata property 'color'"));
  });

  it('rejects bad timeouts', () => {
    expect(() => parseMetadata({ timeout: 'soon' })).toThrow("Invalid timeout 'soon'; must be a number of seconds");
    expect(() => parseMetadata({ timeout: '0' })).toThrow("Invalid timeout '0'; must be positive");
    expect(() => parseMetadata({ timeout: '-5' })).toThrow(MetadataError);
  });

  it('caps timeouts at what a timer can hold', () => {
    expect(MAX_TIMEOUT_SECONDS).toBe(2147483);
    expect(parseMetadata({ timeout: '2147483' }).timeout).toBe(2147483);
    expect(() => parseMetadata({ timeout: '3000000' })).toThrow(
      "Invalid timeout '3000000'; must be at most 2147483 seconds"
    );
  });

  it('requires absolute required files', () => {
    expect(() => parseMetadata({ required_files: 'etc/passwd' })).toThrow(
      "Required file 'etc/passwd' must be an absolute path"
    );
  });

  it('rejects other values for constrained properties', () => {
    expect(() => parseMetadata({ required_user: 'admin' })).toThrow(
      "Invalid required_user 'admin'; must be root or unprivileged"
    );
    expect(() => parseMetadata({ has_cleanup: 'maybe' })).toThrow("Invalid boolean 'maybe' for has_cleanup");
    expect(() => parseMetadata({ expected_failure: '  ' })).toThrow('expected_failure needs a reason');
  });

  it('accepts yes and no as booleans', () => {
    expect(parseMetadata({ has_cleanup: 'yes' }).hasCleanup).toBe(true);
    expect(parseMetadata({ has_cleanup: 'NO' }).hasCleanup).toBe(false);
  });
});

describe('splitWords', () => {
  it('splits on any whitespace', () => {
    expect(splitWords('  a\tb\n c ')).toEqual(['a', 'b', 'c']);
    expect(splitWords('')).toEqual([]);
  });
});

describe('parseBytes', () => {
  it('understands binary units', () => {
    expect(parseBytes('512')).toBe(512);
    expect(parseBytes('1k')).toBe(1024);
    expect(parseBytes('3G')).toBe(3 * 1024 ** 3);
    expect(parseBytes('1T')).toBe(1024 ** 4);
  });

  it('rejects anything else', () => {
    expect(() => parseBytes('1.5G')).toThrow("Invalid memory amount '1.5G'");
    expect(() => parseBytes('lots')).toThrow(MetadataError);
  });
});
