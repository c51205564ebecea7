/*
  Class statistics over every exported sample set

  Prints the most frequent classes by instance count (boxes) and by
  appearance count (images containing the class), and writes the full
  counts to OUTPUT_DIRECTORY/class_statistics.json.

  Usage:
    npm run analyze -w @sampler/server -- --top 20
*/

import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadSettings } from '../src/config.js';
import { errorMessage } from '../src/errors.js';
import { Loader } from '../src/services/loader.js';
import { computeClassStatistics, rankClassCounts, type RankedCounts } from '../src/services/statistics.js';

dotenv.config();

const argv = yargs(hideBin(process.argv))
  .option('top', { alias:'n', type:'number', default:20, desc:'Number of classes to list' })
  .option('skip-header', { type:'boolean', default:false, desc:'Skip the first row of the label CSV' })
  .parseSync();

function printRanking(title: string, ranked: RankedCounts) {
  console.log(`\n${title}`);
  for (const { label, count } of ranked.top) {
    console.log(`  ${label.padEnd(32)} ${count}`);
  }
  console.log(`  ${'(OTHERS)'.padEnd(32)} ${ranked.othersCount}`);
}

async function main() {
  console.log('Running sample analysis...');
  const settings = loadSettings();
  const loader = new Loader(settings);
  await loader.loadLabels(settings.labelsFile, { skipFirstRow: argv['skip-header'] });

  const samples = loader.loadAllSampleSets();
  const stats = computeClassStatistics(samples, loader.labelMap.keys());
  const getLabel = (id: string) => loader.getLabel(id);

  printRanking(`Instances (${stats.sampleCount} images)`, rankClassCounts(stats.instances, argv.top, getLabel));
  printRanking(`Appearances (${stats.sampleCount} images)`, rankClassCounts(stats.appearances, argv.top, getLabel));

  fs.mkdirSync(settings.outputDirectory, { recursive: true });
  const outPath = path.join(settings.outputDirectory, 'class_statistics.json');
  fs.writeFileSync(outPath, JSON.stringify({
    created_at: new Date().toISOString(),
    sample_count: stats.sampleCount,
    instances: stats.instances,
    appearances: stats.appearances,
  }, null, 2));

  console.log(`\n📊 Statistics saved to: ${outPath}`);
}

main().catch((error) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exit(1);
});
