import { LoadError } from '../../engine/errors.js';

const HEADER = 'Content-Type: application/X-atf-tp; version="1"';

const PROPERTY_LINE = /^([A-Za-z0-9_.-]+):\s?(.*)$/;

/** ATF property names and the metadata keys they become. */
const ATF_PROPERTIES: Record<string, string> = {
  descr: 'description',
  'has.cleanup': 'has_cleanup',
  'require.arch': 'allowed_architectures',
  'require.config': 'required_configs',
  'require.files': 'required_files',
  'require.machine': 'allowed_platforms',
  'require.memory': 'required_memory',
  'require.progs': 'required_programs',
  'require.user': 'required_user',
  timeout: 'timeout',
};

export interface AtfTestCaseDefinition {
  name: string;
  properties: Record<string, string>;
}

/** Parses the output of `<program> -l`. */
export function parseTestCaseList(binary: string, output: string): AtfTestCaseDefinition[] {
  const lines = output.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  if (lines[0] !== HEADER) {
    throw new LoadError(binary, `Invalid header '${lines[0] ?? ''}'; expected '${HEADER}'`);
  }
  if (lines.length < 2 || lines[1] !== '') {
    throw new LoadError(binary, 'Missing blank line after the header');
  }

  const definitions: AtfTestCaseDefinition[] = [];
  const seen = new Set<string>();
  let current: AtfTestCaseDefinition | undefined;

  for (let i = 2; i < lines.length; i++) {
    const line = lines[i];
    if (line === '') {
      if (!current) {
        throw new LoadError(binary, `Unexpected blank line at line ${i + 1}`);
      }
      current = undefined;
      continue;
    }

    const match = line.match(PROPERTY_LINE);
    if (!match) {
      throw new LoadError(binary, `Malformed line ${i + 1}: '${line}'`);
    }
    const [, key, value] = match;

    if (!current) {
      if (key !== 'ident') {
        throw new LoadError(binary, `Test case definition at line ${i + 1} must start with ident`);
      }
      if (value.length === 0) {
        throw new LoadError(binary, `Empty test case name at line ${i + 1}`);
      }
      if (seen.has(value)) {
        throw new LoadError(binary, `Duplicate test case '${value}'`);
      }
      seen.add(value);
      current = { name: value, properties: {} };
      definitions.push(current);
      continue;
    }

    if (key === 'ident') {
      throw new LoadError(binary, `Missing blank line before ident at line ${i + 1}`);
    }
    current.properties[translateProperty(binary, key)] = value;
  }

  if (definitions.length === 0) {
    throw new LoadError(binary, 'No test cases');
  }
  return definitions;
}

function translateProperty(binary: string, key: string): string {
  if (key.startsWith('X-')) {
    return key;
  }
  const translated = Object.hasOwn(ATF_PROPERTIES, key) ? ATF_PROPERTIES[key] : undefined;
  if (!translated) {
    throw new LoadError(binary, `Unknown test case metadata property '${key}'`);
  }
  return translated;
}
