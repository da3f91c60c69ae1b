import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { DirectoryBackgroundAcquirer } from '../pipeline/collaborators';
import { PgShortsRepository } from '../pipeline/repository';
import { MediaToolkit } from '../pipeline/toolkit';

async function main() {
    const repo = new PgShortsRepository();
    await yargs(hideBin(process.argv))
        .command(
            'import',
            `Register new *.mp4 files from ${ENV.backgroundsRoot}/<theme>/`,
            (y) =>
                y
                    .option('theme', { type: 'string', demandOption: true })
                    .option('limit', { type: 'number', default: 100 }),
            async (argv) => {
                const theme = String(argv.theme);
                const acquirer = new DirectoryBackgroundAcquirer(
                    new MediaToolkit(),
                    async (t) => new Set((await repo.listBackgrounds(t)).map((c) => c.filename))
                );
                const found = await acquirer.acquire(theme, Number(argv.limit));
                const added = await repo.registerBackgrounds(found);
                console.log(`Registered ${added.length} clip(s) for theme "${theme}"`);
            }
        )
        .command(
            'stats',
            'Clip counts and usage per theme',
            (y) => y,
            async () => {
                const stats = await repo.backgroundStats();
                if (!stats.length) {
                    console.log('Background pool is empty.');
                    return;
                }
                for (const s of stats) {
                    console.log(
                        `${s.theme.padEnd(16)} clips=${String(s.clips).padStart(4)}  uses=${String(s.totalUsage).padStart(5)}  avg=${s.avgUsage.toFixed(2)}`
                    );
                }
            }
        )
        .command(
            'list',
            'Clips of one theme in selection order',
            (y) => y.option('theme', { type: 'string', demandOption: true }),
            async (argv) => {
                for (const c of await repo.listBackgrounds(String(argv.theme))) {
                    const dur = c.durationSec === null ? '   ?' : c.durationSec.toFixed(1).padStart(6);
                    console.log(`#${c.id}  used=${c.usageCount}  ${dur}s  ${c.filename}`);
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
