import fs from 'node:fs/promises';
import path from 'node:path';

import { resolveSeriesPaths, type ConverterConfig } from '../config';
import { describeError, DiscoveryError, IOError } from '../errors';
import type { SliceFormat } from '../formats/types';
import { VolumeLoader } from '../loaders/volumeLoader';
import { createLogger, type Logger } from '../logger';
import { readMetadataSidecar, writeMetadataSidecar } from '../sidecar/metadataSidecar';
import { listSubdirectories } from '../shared/utils/fileNames';
import { readChunkedStore, writeChunkedStore } from '../store/chunkedStore';
import { toMetadataRecord } from '../types/series';
import { VolumeWriter, type VolumeWriteResult } from '../writers/volumeWriter';

export type SeriesStage = 'load' | 'write-store' | 'write-sidecar' | 'read-store' | 'read-sidecar' | 'reconstruct';

export type ConvertedSeries = {
  storePath: string;
  sidecarPath: string;
};

export type SeriesResult =
  | {
      status: 'ok';
      seriesId: string;
      storePath: string;
      sidecarPath: string;
      reconstruction: VolumeWriteResult;
    }
  | { status: 'skipped'; seriesId: string; reason: string }
  | { status: 'failed'; seriesId: string; stage: SeriesStage; reason: string; error: unknown };

export type BatchResult = {
  rawDir: string;
  series: SeriesResult[];
};

/** Wraps the failure of one pipeline stage; `cause` holds the original error. */
export class SeriesStageError extends Error {
  readonly stage: SeriesStage;
  readonly reason: string;

  constructor(stage: SeriesStage, cause: unknown) {
    const reason = describeError(cause);
    super(`${stage} failed: ${reason}`, { cause });
    this.name = 'SeriesStageError';
    this.stage = stage;
    this.reason = reason;
  }
}

async function runStage<T>(stage: SeriesStage, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof DiscoveryError) {
      throw error;
    }
    throw new SeriesStageError(stage, error);
  }
}

/**
 * Drives one series through load, store, sidecar and reconstruction, each
 * step awaited before the next.
 */
export class SeriesConverter {
  private readonly loader: VolumeLoader;
  private readonly writer: VolumeWriter;
  private readonly logger: Logger;

  constructor(
    private readonly config: ConverterConfig,
    format: SliceFormat,
    logger: Logger = createLogger('series-converter')
  ) {
    this.logger = logger;
    this.loader = new VolumeLoader(format.source, logger);
    this.writer = new VolumeWriter({ encoder: format.encoder, logger });
  }

  /** Loads `seriesDir` and writes its store and sidecar. */
  async convertSeries(seriesDir: string, seriesId = path.basename(seriesDir)): Promise<ConvertedSeries> {
    const { storePath, sidecarPath } = resolveSeriesPaths(this.config, seriesId);

    const series = await runStage('load', () => this.loader.load(seriesDir));
    await runStage('write-store', () =>
      writeChunkedStore(series.volume, series.geometry, storePath, {
        byteOrder: this.config.byteOrder,
        logger: this.logger
      })
    );
    await runStage('write-sidecar', () => writeMetadataSidecar(toMetadataRecord(series), sidecarPath));

    this.logger.info(`Saved ${seriesId} to ${storePath} and ${sidecarPath}`);
    return { storePath, sidecarPath };
  }

  /** Rebuilds a slice directory for `seriesId` from its store and sidecar. */
  async reconstructSeries(seriesId: string, converted?: ConvertedSeries): Promise<VolumeWriteResult> {
    const paths = resolveSeriesPaths(this.config, seriesId);
    const storePath = converted?.storePath ?? paths.storePath;
    const sidecarPath = converted?.sidecarPath ?? paths.sidecarPath;

    const volume = await runStage('read-store', () => readChunkedStore(storePath, this.logger));
    const record = await runStage('read-sidecar', () => readMetadataSidecar(sidecarPath));
    return runStage('reconstruct', () => this.writer.write(volume, record, paths.outputDir));
  }

  async processSeries(seriesDir: string): Promise<SeriesResult> {
    const seriesId = path.basename(seriesDir);
    this.logger.info(`Processing series ${seriesId}`);
    try {
      const converted = await this.convertSeries(seriesDir, seriesId);
      const reconstruction = await this.reconstructSeries(seriesId, converted);
      return { status: 'ok', seriesId, ...converted, reconstruction };
    } catch (error) {
      if (error instanceof DiscoveryError) {
        this.logger.info(`Skipping ${seriesId}: ${error.message}`);
        return { status: 'skipped', seriesId, reason: error.message };
      }
      if (error instanceof SeriesStageError) {
        this.logger.error(`Series ${seriesId} failed during ${error.stage}: ${error.reason}`);
        return { status: 'failed', seriesId, stage: error.stage, reason: error.reason, error: error.cause };
      }
      throw error;
    }
  }

  /** Processes every subdirectory of the raw root, one series at a time. */
  async runBatch(): Promise<BatchResult> {
    const { rawDir } = this.config;
    try {
      const stats = await fs.stat(rawDir);
      if (!stats.isDirectory()) {
        throw new IOError('Raw data root is not a directory', { path: rawDir });
      }
    } catch (error) {
      if (error instanceof IOError) {
        throw error;
      }
      throw new IOError('Raw data root does not exist', { path: rawDir, cause: error });
    }

    const series: SeriesResult[] = [];
    for (const seriesDir of await listSubdirectories(rawDir)) {
      series.push(await this.processSeries(seriesDir));
    }
    return { rawDir, series };
  }
}
