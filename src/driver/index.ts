export * from './types.js';
export { runSuite, runTestCase, listSuite, summarize, reportIsGood, safeFileName } from './driver.js';
export { FilterSet, parseFilter, filterMatchesProgram, filterMatchesTestCase, type TestFilter } from './filters.js';
