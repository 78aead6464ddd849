import { readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { glob, hasMagic } from 'glob';
import yaml from 'js-yaml';
import { Context } from '../engine/context.js';
import { EngineError, ManifestError, errorMessage } from '../engine/errors.js';
import type { TestProgram } from '../engine/test-program.js';
import { createTestProgram, isInterfaceName, INTERFACE_NAMES } from '../interfaces/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('manifest');

export const DEFAULT_MANIFEST = 'Testfile.yaml';

const MANIFEST_KEYS = ['test_suite', 'test_programs', 'include'];
const PROGRAM_KEYS = ['interface', 'path', 'test_suite', 'metadata'];

interface ProgramEntry {
  interface: string;
  path: string;
  testSuite?: string;
  metadata?: Record<string, string>;
}

interface ManifestDocument {
  testSuite?: string;
  programs: ProgramEntry[];
  include: string[];
}

/**
 * Loads the test programs described by a manifest and everything it
 * includes. Binaries are reported relative to the top-level manifest's
 * directory, which becomes every program's root.
 */
export async function loadManifest(file: string, context: Context = Context.current()): Promise<TestProgram[]> {
  const topLevel = path.resolve(context.cwd, file);
  const root = path.dirname(topLevel);
  return loadFile(topLevel, undefined, { root, context, visiting: new Set() });
}

interface LoadState {
  root: string;
  context: Context;
  visiting: Set<string>;
}

async function loadFile(file: string, defaultSuite: string | undefined, state: LoadState): Promise<TestProgram[]> {
  if (state.visiting.has(file)) {
    throw new ManifestError(file, 'Include cycle detected');
  }
  state.visiting.add(file);
  log.debug(`Loading ${file}`);

  const document = parseDocument(file, await readManifest(file));
  const dir = path.dirname(file);
  const suite = document.testSuite ?? defaultSuite;
  const programs: TestProgram[] = [];

  for (const entry of document.programs) {
    const testSuiteName = entry.testSuite ?? suite;
    if (!testSuiteName) {
      throw new ManifestError(file, `Test program '${entry.path}' does not belong to any test suite`);
    }
    for (const binary of await expandPath(file, dir, entry.path)) {
      programs.push(buildProgram(file, entry, {
        binary: path.relative(state.root, binary),
        root: state.root,
        testSuiteName,
        context: state.context,
      }));
    }
  }

  for (const include of document.include) {
    programs.push(...await loadFile(path.resolve(dir, include), suite, state));
  }

  state.visiting.delete(file);
  return programs;
}

async function readManifest(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf-8');
  } catch (error) {
    throw new ManifestError(file, `Cannot read manifest: ${errorMessage(error)}`, { cause: error });
  }
}

function buildProgram(
  file: string,
  entry: ProgramEntry,
  identity: { binary: string; root: string; testSuiteName: string; context: Context }
): TestProgram {
  try {
    return createTestProgram(entry.interface, { ...identity, metadata: entry.metadata });
  } catch (error) {
    if (error instanceof EngineError) {
      throw new ManifestError(file, `Test program '${identity.binary}': ${error.message}`, { cause: error });
    }
    throw error;
  }
}

async function expandPath(file: string, dir: string, pattern: string): Promise<string[]> {
  if (path.isAbsolute(pattern)) {
    throw new ManifestError(file, `Test program path '${pattern}' must be relative`);
  }

  if (hasMagic(pattern)) {
    const matches = await glob(pattern, { cwd: dir, nodir: true });
    if (matches.length === 0) {
      throw new ManifestError(file, `Pattern '${pattern}' matched no test programs`);
    }
    return matches.sort().map(match => path.resolve(dir, match));
  }

  const binary = path.resolve(dir, pattern);
  if (!(await isFile(binary))) {
    throw new ManifestError(file, `Test program '${pattern}' not found`);
  }
  return [binary];
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export function parseDocument(file: string, content: string): ManifestDocument {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ManifestError(file, `Invalid YAML: ${errorMessage(error)}`, { cause: error });
  }

  if (!isMapping(raw)) {
    throw new ManifestError(file, 'Manifest must be a mapping');
  }
  checkKeys(file, raw, MANIFEST_KEYS, 'manifest');

  const testSuite = optionalString(file, raw.test_suite, 'test_suite');

  const programs = raw.test_programs ?? [];
  if (!Array.isArray(programs)) {
    throw new ManifestError(file, "'test_programs' must be a list");
  }

  const include = raw.include ?? [];
  if (!Array.isArray(include) || !include.every((item): item is string => typeof item === 'string')) {
    throw new ManifestError(file, "'include' must be a list of paths");
  }

  return {
    testSuite,
    programs: programs.map((entry, index) => parseProgramEntry(file, entry, index)),
    include,
  };
}

function parseProgramEntry(file: string, entry: unknown, index: number): ProgramEntry {
  const where = `test_programs[${index}]`;
  if (!isMapping(entry)) {
    throw new ManifestError(file, `${where} must be a mapping`);
  }
  checkKeys(file, entry, PROGRAM_KEYS, where);

  const iface = entry.interface;
  if (typeof iface !== 'string' || !isInterfaceName(iface)) {
    throw new ManifestError(file, `${where}.interface must be one of: ${INTERFACE_NAMES.join(', ')}`);
  }
  if (typeof entry.path !== 'string' || entry.path.length === 0) {
    throw new ManifestError(file, `${where}.path must be a non-empty string`);
  }

  const parsed: ProgramEntry = {
    interface: iface,
    path: entry.path,
    testSuite: optionalString(file, entry.test_suite, `${where}.test_suite`),
  };

  if (entry.metadata !== undefined) {
    if (iface !== 'plain') {
      throw new ManifestError(file, `${where}: only plain test programs take metadata; ${iface} programs declare their own`);
    }
    parsed.metadata = parseMetadataMapping(file, entry.metadata, `${where}.metadata`);
  }
  return parsed;
}

function parseMetadataMapping(file: string, value: unknown, where: string): Record<string, string> {
  if (!isMapping(value)) {
    throw new ManifestError(file, `${where} must be a mapping`);
  }
  const metadata: Record<string, string> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'string') {
      metadata[key] = raw;
    } else if (typeof raw === 'number' || typeof raw === 'boolean') {
      metadata[key] = String(raw);
    } else if (Array.isArray(raw) && raw.every(item => typeof item === 'string')) {
      metadata[key] = raw.join(' ');
    } else {
      throw new ManifestError(file, `${where}.${key} must be a scalar or a list of strings`);
    }
  }
  return metadata;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function checkKeys(file: string, value: Record<string, unknown>, allowed: string[], where: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new ManifestError(file, `Unknown key '${key}' in ${where}`);
    }
  }
}

function optionalString(file: string, value: unknown, where: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ManifestError(file, `'${where}' must be a non-empty string`);
  }
  return value;
}
