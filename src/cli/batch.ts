import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { PLATFORM_KEYS, getPlatform } from '../pipeline/platforms';
import { batchBuild, createDefaultDeps, describeOutcome } from '../pipeline/shorts';

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .option('platform', { type: 'string', choices: PLATFORM_KEYS, default: 'tiktok' })
        .option('limit', { type: 'number', default: 5 })
        .option('policy', { type: 'string', choices: ['skip', 'replace'] as const })
        .help()
        .parse();

    const platform = getPlatform(String(argv.platform)).key;
    const limit = Math.max(1, Number(argv.limit) || 1);
    const policy = argv.policy === 'replace' || argv.policy === 'skip' ? argv.policy : ENV.rebuildPolicy;

    const summary = await batchBuild(createDefaultDeps(), platform, limit, {
        policy,
        runLog: true,
        onOutcome: (o, i, total) => {
            console.log(`[${i + 1}/${total}] ${o.videoId}: ${describeOutcome(o)}`);
        },
    });

    console.log(`\n=== Batch Summary (${platform}) ===`);
    console.log(`Candidates: ${summary.total}`);
    console.log(`Built:      ${summary.built}`);
    console.log(`Skipped:    ${summary.skipped}`);
    console.log(`Failed:     ${summary.failed}`);
    if (summary.failed > 0) process.exitCode = 2;
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
