import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { purgeTemp } from '../pipeline/purge';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('days', { type: 'number', default: 7, describe: 'Delete temp entries older than this' })
    .option('dry-run', { type: 'boolean', default: false })
    .help()
    .parse();

  const tempDir = path.join(ENV.shortsRoot, 'temp');
  const res = await purgeTemp(tempDir, Number(argv.days), { dryRun: argv['dry-run'] });
  for (const p of res.removed) console.log(argv['dry-run'] ? 'Would remove' : 'Removed', p);
  console.log(`${res.removed.length} of ${res.scanned} entries ${argv['dry-run'] ? 'would be ' : ''}removed from ${tempDir}`);
  if (res.failed) {
    console.error(`${res.failed} entries could not be removed`);
    process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
