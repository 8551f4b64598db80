import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { withStore } from '../db/store';

async function main() {
    await yargs(hideBin(process.argv))
        .command(
            'list',
            'List indexed channels',
            (y) => y.option('format', { choices: ['table', 'json'] as const, default: 'table' as const }),
            async (argv) => {
                const channels = await withStore((store) => store.listChannels());
                if (argv.format === 'json') {
                    console.log(JSON.stringify(channels, null, 2));
                } else if (!channels.length) {
                    console.log('No channels');
                } else {
                    console.table(channels);
                }
            }
        )
        .command(
            'remove <uploader>',
            'Remove a channel with all its videos and captions',
            (y) =>
                y.positional('uploader', {
                    type: 'string',
                    demandOption: true,
                    describe: 'Channel user handle (ie. @user)',
                }),
            async (argv) => {
                const res = await withStore((store) => store.deleteChannel(argv.uploader));
                if (!res.channelDeleted) {
                    console.log(`No channel ${argv.uploader}`);
                    return;
                }
                console.log(`Removed ${argv.uploader} (${res.videosDeleted} videos)`);
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
