import { MetadataError } from './errors.js';
import type { PropertiesMap } from './test-case.js';

export const DEFAULT_TIMEOUT_SECONDS = 300;

/** Longest timeout a Node timer can hold, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = Math.floor(0x7fffffff / 1000);

export type RequiredUser = 'root' | 'unprivileged';

export interface Metadata {
  description: string;
  timeout: number;
  allowedArchitectures: string[];
  allowedPlatforms: string[];
  requiredConfigs: string[];
  requiredFiles: string[];
  requiredPrograms: string[];
  requiredMemory: number;
  requiredUser?: RequiredUser;
  hasCleanup: boolean;
  expectedFailure?: string;
  /** `X-` prefixed user properties, keyed by their full name. */
  custom: Record<string, string>;
}

export const METADATA_KEYS = [
  'description',
  'timeout',
  'allowed_architectures',
  'allowed_platforms',
  'required_configs',
  'required_files',
  'required_programs',
  'required_memory',
  'required_user',
  'has_cleanup',
  'expected_failure',
] as const;

type MetadataKey = typeof METADATA_KEYS[number];

const MEMORY_UNITS: Record<string, number> = {
  '': 1,
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
};

export function parseMetadata(properties: PropertiesMap): Metadata {
  const metadata: Metadata = {
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
  };

  for (const [key, value] of Object.entries(properties)) {
    if (key.startsWith('X-')) {
      metadata.custom[key] = value;
      continue;
    }
    if (!isMetadataKey(key)) {
      throw new MetadataError(`Unknown metadata property '${key}'`);
    }
    applyProperty(metadata, key, value);
  }

  return metadata;
}

function applyProperty(metadata: Metadata, key: MetadataKey, value: string): void {
  switch (key) {
    case 'description':
      metadata.description = value;
      break;
    case 'timeout':
      metadata.timeout = parseTimeout(value);
      break;
    case 'allowed_architectures':
      metadata.allowedArchitectures = splitWords(value);
      break;
    case 'allowed_platforms':
      metadata.allowedPlatforms = splitWords(value);
      break;
    case 'required_configs':
      metadata.requiredConfigs = splitWords(value);
      break;
    case 'required_files':
      metadata.requiredFiles = splitWords(value);
      for (const file of metadata.requiredFiles) {
        if (!file.startsWith('/')) {
          throw new MetadataError(`Required file '${file}' must be an absolute path`);
        }
      }
      break;
    case 'required_programs':
      metadata.requiredPrograms = splitWords(value);
      break;
    case 'required_memory':
      metadata.requiredMemory = parseBytes(value);
      break;
    case 'required_user':
      if (value !== 'root' && value !== 'unprivileged') {
        throw new MetadataError(`Invalid required_user '${value}'; must be root or unprivileged`);
      }
      metadata.requiredUser = value;
      break;
    case 'has_cleanup':
      metadata.hasCleanup = parseBoolean(key, value);
      break;
    case 'expected_failure':
      if (value.trim().length === 0) {
        throw new MetadataError('expected_failure needs a reason');
      }
      metadata.expectedFailure = value;
      break;
  }
}

function isMetadataKey(key: string): key is MetadataKey {
  return (METADATA_KEYS as readonly string[]).includes(key);
}

export function splitWords(value: string): string[] {
  return value.split(/\s+/).filter(word => word.length > 0);
}

function parseTimeout(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new MetadataError(`Invalid timeout '${value}'; must be a number of seconds`);
  }
  const seconds = parseInt(value, 10);
  if (seconds <= 0) {
    throw new MetadataError(`Invalid timeout '${value}'; must be positive`);
  }
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new MetadataError(`Invalid timeout '${value}'; must be at most ${MAX_TIMEOUT_SECONDS} seconds`);
  }
  return seconds;
}

export function parseBytes(value: string): number {
  const match = value.trim().match(/^(\d+)([KMGT]?)$/i);
  if (!match) {
    throw new MetadataError(`Invalid memory amount '${value}'`);
  }
  return parseInt(match[1], 10) * MEMORY_UNITS[match[2].toUpperCase()];
}

function parseBoolean(key: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case 'yes':
      return true;
    case 'false':
    case 'no':
      return false;
    default:
      throw new MetadataError(`Invalid boolean '${value}' for ${key}`);
  }
}
