/*
  Download the images of one sample set

  Images land in STORAGE_DIRECTORY/sample_images/set_<n>/<key>.jpg.
  Images already on disk are skipped, so a rerun retries only the failures.

  Usage:
    npm run load-images -w @sampler/server -- --set-index 0 --max-threads 5
*/

import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadSettings } from '../src/config.js';
import { errorMessage } from '../src/errors.js';
import { ImageStore } from '../src/services/image-store.js';
import { loadSampleImages } from '../src/services/image-loader.js';
import { Loader } from '../src/services/loader.js';

dotenv.config();

const argv = yargs(hideBin(process.argv))
  .option('set-index', { alias:'i', type:'number', default:0, desc:'Index of the sample set to load' })
  .option('max-threads', { alias:'m', type:'number', desc:'Concurrent downloads (default: MAX_THREADS)' })
  .option('debug', { type:'boolean', default:false, desc:'Log pool activity' })
  .parseSync();

async function main() {
  console.log('Running sample image loader...');
  const settings = loadSettings();
  const loader = new Loader(settings);
  const store = new ImageStore(settings.storageDirectory);

  const setIndex = argv['set-index'];
  const samples = loader.loadSampleSet(setIndex);
  const local = samples.filter((s) => store.isLocallyLoaded(s)).length;
  console.log(`Samples loaded: ${local}/${samples.length}`);

  const summary = await loadSampleImages(samples, store, {
    maxThreads: argv['max-threads'] ?? settings.maxThreads,
    debug: argv.debug,
    onProgress: (done, pending) => {
      if (done % 100 === 0 || done === pending) {
        console.log(`Loading samples ${done}/${pending}...`);
      }
    },
  });

  console.log(`\n✅ Set ${setIndex}: ${summary.loaded} downloaded, ${summary.alreadyLoaded} already local, ${summary.failed} failed`);
  if (summary.failed > 0) {
    console.log('Run again to retry the failed images.');
  }
}

main().catch((error) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exit(1);
});
