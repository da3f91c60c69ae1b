import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { buildReport, renderReport, updatePerformance } from '../pipeline/analytics';
import { PLATFORM_KEYS, getPlatform } from '../pipeline/platforms';
import { PgShortsRepository } from '../pipeline/repository';

async function main() {
  const repo = new PgShortsRepository();
  await yargs(hideBin(process.argv))
    .command(
      'report',
      'Per-platform stats and top shorts',
      (y) =>
        y
          .option('days', { type: 'number', default: 30 })
          .option('top', { type: 'number', default: 5 }),
      async (argv) => {
        const report = await buildReport(repo, Number(argv.days), Number(argv.top));
        process.stdout.write(renderReport(report));
      }
    )
    .command(
      'update',
      'Record post-publication metrics for a short',
      (y) =>
        y
          .option('video', { type: 'string', demandOption: true })
          .option('platform', { type: 'string', choices: PLATFORM_KEYS, demandOption: true })
          .option('views', { type: 'number' })
          .option('likes', { type: 'number' })
          .option('shares', { type: 'number' })
          .option('comments', { type: 'number' })
          .option('published', { type: 'boolean' }),
      async (argv) => {
        const found = await updatePerformance(repo, String(argv.video), getPlatform(String(argv.platform)).key, {
          views: argv.views,
          likes: argv.likes,
          shares: argv.shares,
          comments: argv.comments,
          status: argv.published ? 'published' : undefined,
        });
        if (!found) {
          console.error(`No analytics row for ${argv.video} on ${argv.platform}`);
          process.exitCode = 1;
        } else {
          console.log('Updated', argv.video, argv.platform);
        }
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
