import {
  createLogger,
  createSliceFormat,
  describeError,
  loadConverterConfig,
  SeriesConverter,
  type SeriesResult
} from '../src/index.ts';

const log = createLogger('convert-series');

function describeResult(result: SeriesResult): string {
  switch (result.status) {
    case 'ok': {
      const { written, slices, outputDir } = result.reconstruction;
      return `${result.seriesId}: ok (${written}/${slices.length} slice(s) reconstructed in ${outputDir})`;
    }
    case 'skipped':
      return `${result.seriesId}: skipped (${result.reason})`;
    case 'failed':
      return `${result.seriesId}: failed during ${result.stage} (${result.reason})`;
    default: {
      const exhaustive: never = result;
      return String(exhaustive);
    }
  }
}

async function main() {
  const config = loadConverterConfig();
  const converter = new SeriesConverter(config, createSliceFormat(config.format));

  log.info(`Converting ${config.format} series from ${config.rawDir}`);
  const { series } = await converter.runBatch();

  for (const result of series) {
    console.log(describeResult(result));
  }
  const failed = series.filter((result) => result.status === 'failed').length;
  console.log(`Series processed: ${series.length}, failed: ${failed}`);
  if (failed > 0) {
    process.exitCode = 1;
  }
}

try {
  await main();
} catch (error) {
  log.error(describeError(error));
  process.exitCode = 1;
}
