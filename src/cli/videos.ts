import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { isSafeVideoId, toVideoId } from '../pipeline/ids';
import { PgShortsRepository } from '../pipeline/repository';

// Registers a video as a build candidate; theme selects its background pool.
async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('video', { type: 'string', demandOption: true, describe: 'Video id or URL' })
    .option('theme', { type: 'string' })
    .option('title', { type: 'string' })
    .help()
    .parse();

  const raw = String(argv.video);
  const id = toVideoId(raw);
  if (!isSafeVideoId(id)) {
    console.error('Not a usable video id:', id);
    process.exit(1);
  }
  await new PgShortsRepository().ensureVideo({
    id,
    url: raw === id ? null : raw,
    title: argv.title ?? null,
    theme: argv.theme ?? null,
  });
  console.log('Registered', id, argv.theme ? `(theme ${argv.theme})` : '');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
