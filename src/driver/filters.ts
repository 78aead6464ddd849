import * as path from 'node:path';
import { EngineError } from '../engine/errors.js';

/** `program[:case]`, where program may also name a directory of programs. */
export interface TestFilter {
  raw: string;
  programPath: string;
  testCase?: string;
}

export function parseFilter(raw: string): TestFilter {
  if (raw.length === 0) {
    throw new EngineError('Test filter cannot be empty');
  }

  const colon = raw.indexOf(':');
  const programPart = colon === -1 ? raw : raw.slice(0, colon);
  const testCase = colon === -1 ? undefined : raw.slice(colon + 1);

  if (programPart.length === 0) {
    throw new EngineError(`Test filter '${raw}' has no program path`);
  }
  if (path.posix.isAbsolute(programPart)) {
    throw new EngineError(`Test filter '${raw}' must use a path relative to the suite root`);
  }
  if (testCase !== undefined && testCase.length === 0) {
    throw new EngineError(`Test filter '${raw}' has an empty test case name`);
  }

  const programPath = path.posix.normalize(programPart).replace(/\/$/, '');
  if (programPath === '..' || programPath.startsWith('../')) {
    throw new EngineError(`Test filter '${raw}' points outside the suite root`);
  }
  return testCase === undefined ? { raw, programPath } : { raw, programPath, testCase };
}

export function filterMatchesProgram(filter: TestFilter, binary: string): boolean {
  if (filter.testCase !== undefined) {
    return filter.programPath === binary;
  }
  return filter.programPath === '.' || filter.programPath === binary || binary.startsWith(`${filter.programPath}/`);
}

export function filterMatchesTestCase(filter: TestFilter, binary: string, name: string): boolean {
  if (!filterMatchesProgram(filter, binary)) {
    return false;
  }
  return filter.testCase === undefined || filter.testCase === name;
}

/**
 * A set of filters joined by "or". An empty set matches everything.
 * Remembers which filters selected at least one test case.
 */
export class FilterSet {
  private readonly filters: TestFilter[];
  private readonly used = new Set<TestFilter>();

  constructor(filters: TestFilter[]) {
    this.filters = filters;
  }

  static parse(raw: string[]): FilterSet {
    return new FilterSet(raw.map(parseFilter));
  }

  matchesProgram(binary: string): boolean {
    return this.filters.length === 0 || this.filters.some(f => filterMatchesProgram(f, binary));
  }

  matchesTestCase(binary: string, name: string): boolean {
    if (this.filters.length === 0) {
      return true;
    }
    let matched = false;
    for (const filter of this.filters) {
      if (filterMatchesTestCase(filter, binary, name)) {
        this.used.add(filter);
        matched = true;
      }
    }
    return matched;
  }

  unused(): string[] {
    return this.filters.filter(f => !this.used.has(f)).map(f => f.raw);
  }
}
