import { mkdir, readdir, readFile, rm, unlink, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { reportIsGood } from '../driver/driver.js';
import type { RunReport, RunSummary } from '../driver/types.js';
import { EngineError, errorMessage } from '../engine/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('store');

export const DEFAULT_RESULTS_DIR = '.casework/results';

export interface RunListItem {
  id: string;
  startedAt: string;
  duration: number;
  good: boolean;
  summary: RunSummary;
}

export class ResultStore {
  readonly resultsDir: string;

  constructor(resultsDir: string = DEFAULT_RESULTS_DIR) {
    this.resultsDir = resultsDir;
  }

  /** Directory that keeps the captured output of the given run. */
  outputDir(runId: string): string {
    return join(this.resultsDir, runId);
  }

  async save(report: RunReport): Promise<string> {
    await mkdir(this.resultsDir, { recursive: true });
    const filePath = join(this.resultsDir, `${report.id}.json`);
    await writeFile(filePath, JSON.stringify(report, null, 2));
    return filePath;
  }

  async load(runId: string): Promise<RunReport | null> {
    const filePath = join(this.resultsDir, `${runId}.json`);
    if (!existsSync(filePath)) {
      return null;
    }
    return readReport(filePath);
  }

  async list(): Promise<RunListItem[]> {
    if (!existsSync(this.resultsDir)) {
      return [];
    }

    const files = await readdir(this.resultsDir);
    const jsonFiles = files.filter(f => f.endsWith('.json'));

    const runs: RunListItem[] = [];

    for (const file of jsonFiles) {
      try {
        const report = await readReport(join(this.resultsDir, file));

        runs.push({
          id: report.id,
          startedAt: report.startedAt,
          duration: report.duration,
          good: reportIsGood(report),
          summary: report.summary,
        });
      } catch (e) {
        log.warn(`Skipping unreadable results file ${file}: ${errorMessage(e)}`);
      }
    }

    return runs.sort((a, b) =>
      new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime()
    );
  }

  async getLatest(): Promise<RunReport | null> {
    const runs = await this.list();
    if (runs.length === 0) {
      return null;
    }
    return this.load(runs[0].id);
  }

  async delete(runId: string): Promise<boolean> {
    const filePath = join(this.resultsDir, `${runId}.json`);
    if (!existsSync(filePath)) {
      return false;
    }
    await unlink(filePath);
    await rm(this.outputDir(runId), { recursive: true, force: true });
    return true;
  }

  async cleanup(keepCount: number = 50): Promise<number> {
    const runs = await this.list();
    const toDelete = runs.slice(keepCount);

    let deleted = 0;
    for (const run of toDelete) {
      if (await this.delete(run.id)) {
        deleted++;
      }
    }

    return deleted;
  }
}

async function readReport(filePath: string): Promise<RunReport> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new EngineError(`Cannot read run report ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isRunReport(parsed)) {
    throw new EngineError(`${filePath} is not a run report`);
  }
  return parsed;
}

function isRunReport(value: unknown): value is RunReport {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('id' in value) || !('startedAt' in value) || !('duration' in value) || !('config' in value) || !('context' in value)) {
    return false;
  }
  if (!('results' in value) || !('errors' in value) || !('unusedFilters' in value) || !('summary' in value)) {
    return false;
  }
  const { context, summary } = value;
  return (
    typeof value.id === 'string' &&
    typeof value.startedAt === 'string' &&
    typeof value.duration === 'number' &&
    typeof value.config === 'object' && value.config !== null &&
    typeof context === 'object' && context !== null &&
    'cwd' in context && typeof context.cwd === 'string' &&
    Array.isArray(value.results) &&
    Array.isArray(value.errors) &&
    Array.isArray(value.unusedFilters) &&
    typeof summary === 'object' && summary !== null &&
    'total' in summary && typeof summary.total === 'number'
  );
}
