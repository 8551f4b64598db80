import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { withStore } from '../db/store';

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .option('format', { choices: ['table', 'json'] as const, default: 'table' as const })
        .parse();

    const stats = await withStore((store) => store.stats());
    if (argv.format === 'json') {
        console.log(JSON.stringify(stats, null, 2));
        return;
    }
    console.log(`channels  ${stats.channelCount}`);
    console.log(`videos    ${stats.videoCount}`);
    console.log(`segments  ${stats.segmentCount}`);
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
