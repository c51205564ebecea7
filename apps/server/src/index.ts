import fs from 'node:fs';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadSettings } from './config';
import { errorMessage } from './errors';
import { ImageStore } from './services/image-store';
import { Loader } from './services/loader';

dotenv.config();

async function main() {
  const settings = loadSettings();
  const loader = new Loader(settings);
  const imageStore = new ImageStore(settings.storageDirectory);

  if (fs.existsSync(settings.labelsFile)) {
    await loader.loadLabels(settings.labelsFile);
    console.log(`[API] Labels loaded: ${loader.labelMap.size}`);
  } else {
    console.warn(`[API] Label file ${settings.labelsFile} not found, serving raw class ids`);
  }

  const app = createApp({ loader, imageStore });
  app.listen(settings.port, () => {
    console.log(`========================================`);
    console.log(`Sample API listening on port ${settings.port}`);
    console.log(`========================================`);
    console.log(`Health check: http://localhost:${settings.port}/api/health`);
    console.log(`Sample sets: http://localhost:${settings.port}/api/sample-sets`);
  });
}

main().catch((error) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exit(1);
});
