/*
  Build sample sets from the Open Images CSVs

  Reads the image index (file name → URL) and the bounding box annotations,
  joins them into samples and writes sample_set_<n>.json files of
  MAX_SAMPLE_SET_SIZE samples each into SAMPLES_DIRECTORY.

  Usage:
    npm run create-samples -w @sampler/server -- \
      --skip-header \
      --fetch-missing \
      --chunk-size 5000
*/

import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadSettings } from '../src/config.js';
import { errorMessage } from '../src/errors.js';
import { Loader } from '../src/services/loader.js';

dotenv.config();

const argv = yargs(hideBin(process.argv))
  .option('skip-header', { type:'boolean', default:false, desc:'Skip the first row of both CSV files' })
  .option('fetch-missing', { type:'boolean', default:false, desc:'Download missing CSVs from IMAGE_URL_REMOTE / GROUND_TRUTH_REMOTE' })
  .option('chunk-size', { type:'number', desc:'Samples per set (default: MAX_SAMPLE_SET_SIZE)' })
  .parseSync();

async function main() {
  console.log('Running sample creator...');
  const settings = loadSettings();
  const loader = new Loader(settings);
  const csvOptions = { skipFirstRow: argv['skip-header'] };

  // Source data
  await loader.ensureSourceFile(settings.imageUrlFile, argv['fetch-missing'] ? settings.imageUrlRemote : undefined);
  await loader.ensureSourceFile(settings.groundTruthFile, argv['fetch-missing'] ? settings.groundTruthRemote : undefined);

  console.log('\nCreating samples...');
  const samples = await loader.createSamples(settings.imageUrlFile, csvOptions);

  console.log('\nAssociating boxes with samples...');
  const { associated, skipped } = await loader.associateBoxesWithSamples(samples, settings.groundTruthFile, csvOptions);

  console.log('\nExporting sample sets...');
  const chunkSize = argv['chunk-size'] ?? settings.maxSampleSetSize;
  const files = loader.exportSamples(samples, settings.samplesDirectory, chunkSize);

  console.log(`\n✅ Sample creation complete`);
  console.log(`Samples: ${samples.size}`);
  console.log(`Boxes: ${associated} (${skipped} for images outside the index)`);
  console.log(`Sample sets: ${files.length} × ${chunkSize} → ${settings.samplesDirectory}`);
}

main().catch((error) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exit(1);
});
