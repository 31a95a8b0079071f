/**
 * DataRecorder — Samples a planet into tabular rows with named columns.
 *
 * Columns: t, L, a_w, a_b, a_g, temp
 * With latitude columns enabled, per species suffix (w, b, g):
 *   lat_min_*, lat_mean_*, lat_max_*   (band indices, 0 = pole)
 */

import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { SPECIES, SPECIES_SHORT_NAME, type Planet } from '../daisyworld';
import { createLogger } from '../logging/logger';

const log = createLogger('Recorder');

export type DataRow = Record<string, number>;

export interface DataRecorderOptions {
  /** Record when the planet's update count is a multiple of this */
  intervalSteps: number;
  /** Add latitude statistic columns */
  latitude?: boolean;
}

export interface DataRecorder {
  readonly columns: readonly string[];
  /** Append a row if the planet sits on an unrecorded interval step. Returns whether it did. */
  record(planet: Planet): boolean;
  /** Append a row unconditionally. */
  recordNow(planet: Planet): DataRow;
  rows(): readonly DataRow[];
  toCsv(): string;
  writeCsv(filePath: string): Promise<void>;
  /**
   * Move the rows held in memory to the end of `filePath`. The first flush to a
   * path writes the header; calls run one after another in call order.
   */
  flushCsv(filePath: string): Promise<void>;
  clear(): void;
}

export const BASE_COLUMNS = ['t', 'L', 'a_w', 'a_b', 'a_g', 'temp'] as const;

export function latitudeColumns(): string[] {
  const columns: string[] = [];
  for (const species of SPECIES) {
    const s = SPECIES_SHORT_NAME[species];
    columns.push(`lat_min_${s}`, `lat_mean_${s}`, `lat_max_${s}`);
  }
  return columns;
}

export function sampleRow(planet: Planet, latitude: boolean): DataRow {
  const row: DataRow = {
    t: planet.getTime(),
    L: planet.getLuminosity(),
    a_w: planet.getProportion('white'),
    a_b: planet.getProportion('black'),
    a_g: planet.getProportion('gray'),
    temp: planet.getGlobalTemperature(),
  };

  if (latitude) {
    for (const species of SPECIES) {
      const s = SPECIES_SHORT_NAME[species];
      const stats = planet.getLatitudeStats(species);
      row[`lat_min_${s}`] = stats.min;
      row[`lat_mean_${s}`] = stats.mean;
      row[`lat_max_${s}`] = stats.max;
    }
  }

  return row;
}

export function createDataRecorder(options: DataRecorderOptions): DataRecorder {
  const { intervalSteps } = options;
  const latitude = options.latitude ?? false;

  if (!Number.isInteger(intervalSteps) || intervalSteps < 1) {
    throw new Error(`intervalSteps must be a positive integer, got ${intervalSteps}`);
  }

  const columns: readonly string[] = Object.freeze([
    ...BASE_COLUMNS,
    ...(latitude ? latitudeColumns() : []),
  ]);
  let data: DataRow[] = [];
  let lastRecordedStep = -1;
  let flushedPath: string | null = null;
  let flushQueue: Promise<void> = Promise.resolve();

  function recordNow(planet: Planet): DataRow {
    const row = sampleRow(planet, latitude);
    data.push(row);
    lastRecordedStep = planet.getUpdateCount();
    return row;
  }

  function csvHeader(): string {
    return columns.join(',') + '\n';
  }

  function csvLines(rows: readonly DataRow[]): string {
    return rows.map((row) => columns.map((column) => String(row[column])).join(',') + '\n').join('');
  }

  function toCsv(): string {
    return csvHeader() + csvLines(data);
  }

  async function appendPending(filePath: string): Promise<void> {
    const pending = data;
    data = [];

    try {
      if (flushedPath !== filePath) {
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, csvHeader() + csvLines(pending), 'utf8');
        flushedPath = filePath;
      } else if (pending.length > 0) {
        await appendFile(filePath, csvLines(pending), 'utf8');
      }
    } catch (err) {
      // Retried on the next flush
      data = pending.concat(data);
      throw err;
    }

    log.debug(`Flushed ${pending.length} row(s) to ${filePath}`);
  }

  return {
    columns,

    record(planet: Planet): boolean {
      const step = planet.getUpdateCount();
      if (step % intervalSteps !== 0 || step === lastRecordedStep) return false;
      recordNow(planet);
      return true;
    },

    recordNow,

    rows(): readonly DataRow[] {
      return data;
    },

    toCsv,

    async writeCsv(filePath: string): Promise<void> {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, toCsv(), 'utf8');
      log.info(`Wrote ${data.length} row(s) to ${filePath}`);
    },

    flushCsv(filePath: string): Promise<void> {
      const run = flushQueue.then(() => appendPending(filePath));
      // A failed flush rejects `run` for its caller; later flushes still run
      flushQueue = run.catch(() => undefined);
      return run;
    },

    clear(): void {
      data = [];
      lastRecordedStep = -1;
    },
  };
}
