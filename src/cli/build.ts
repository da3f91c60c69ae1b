import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { isSafeVideoId, toVideoId } from '../pipeline/ids';
import { PLATFORM_KEYS, getPlatform } from '../pipeline/platforms';
import { buildShort, createDefaultDeps, describeOutcome } from '../pipeline/shorts';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('video', { type: 'string', demandOption: true, describe: 'Video id or URL' })
    .option('platform', { type: 'string', choices: PLATFORM_KEYS, default: 'tiktok' })
    .option('policy', { type: 'string', choices: ['skip', 'replace'] as const, describe: 'Override REBUILD_POLICY' })
    .option('theme', { type: 'string', describe: 'Background theme to store for this video' })
    .option('run-log', { type: 'boolean', default: true })
    .help()
    .parse();

  const videoId = toVideoId(String(argv.video));
  if (!isSafeVideoId(videoId)) {
    console.error('Not a usable video id:', videoId);
    process.exit(1);
  }
  const platform = getPlatform(String(argv.platform)).key;
  const deps = createDefaultDeps();
  if (argv.theme) await deps.repo.ensureVideo({ id: videoId, theme: argv.theme });

  const outcome = await buildShort(deps, videoId, platform, {
    policy: argv.policy === 'replace' || argv.policy === 'skip' ? argv.policy : ENV.rebuildPolicy,
    runLog: argv['run-log'],
  });
  console.log(`${videoId} [${platform}]: ${describeOutcome(outcome)}`);
  if (outcome.status === 'built' && outcome.output.thumbnailPath) {
    console.log('Thumbnail:', outcome.output.thumbnailPath);
  }
  if (outcome.status === 'failed') process.exit(2);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
