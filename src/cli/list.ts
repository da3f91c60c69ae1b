import fs from 'fs-extra';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { PLATFORM_KEYS, getPlatform } from '../pipeline/platforms';
import { PgShortsRepository } from '../pipeline/repository';

function formatSize(bytes: number): string {
    if (bytes >= 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
    return `${(bytes / 1024).toFixed(0)} KB`;
}

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .option('platform', { type: 'string', choices: PLATFORM_KEYS, describe: 'Only this platform' })
        .option('json', { type: 'boolean', default: false })
        .help()
        .parse();

    const platform = argv.platform ? getPlatform(argv.platform).key : undefined;
    const shorts = await new PgShortsRepository().listShorts(platform);
    if (argv.json) {
        console.log(JSON.stringify(shorts, null, 2));
        return;
    }
    if (!shorts.length) {
        console.log('No shorts recorded.');
        return;
    }
    for (const s of shorts) {
        const exists = await fs.pathExists(s.outputPath);
        const size = exists ? formatSize((await fs.stat(s.outputPath)).size) : 'missing';
        console.log(
            `${s.createdAt.slice(0, 19).replace('T', ' ')}  ${s.platform.padEnd(15)}  ${s.videoId.padEnd(14)}  ${size.padStart(9)}  ${s.outputPath}`
        );
    }
    console.log(`\n${shorts.length} short(s)`);
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
