import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { withStore } from '../db/store';
import { toVideoId } from '../pipeline/ids';

async function main() {
    await yargs(hideBin(process.argv))
        .command(
            'list',
            'List indexed videos',
            (y) =>
                y
                    .option('user', { type: 'string', describe: 'Only videos of this uploader id' })
                    .option('format', { choices: ['table', 'json'] as const, default: 'table' as const }),
            async (argv) => {
                const videos = await withStore((store) => store.listVideos(argv.user));
                if (argv.format === 'json') {
                    console.log(JSON.stringify(videos, null, 2));
                } else if (!videos.length) {
                    console.log('No videos');
                } else {
                    console.table(videos);
                }
            }
        )
        .command(
            'remove <video>',
            'Remove one video with its captions and language records',
            (y) => y.positional('video', { type: 'string', demandOption: true, describe: 'Video id or URL' }),
            async (argv) => {
                const videoId = toVideoId(argv.video);
                const removed = await withStore((store) => store.deleteVideo(videoId));
                console.log(removed ? `Removed ${videoId}` : `No video ${videoId}`);
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
