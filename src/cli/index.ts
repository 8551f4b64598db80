import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { withStore } from '../db/store';
import { ENV } from '../pipeline/env';
import { setLogFile, setLogLevel } from '../pipeline/log';
import { runIndex } from '../pipeline/run';
import { YtDlpMediaSource } from '../pipeline/ytdlp';

// exit status of a run stopped with Ctrl-C
const EXIT_ABORTED = 130;

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .usage('Index the captions of a channel, playlist or video')
        .option('url', {
            type: 'string',
            demandOption: true,
            describe: 'Channel/playlist/video URL, @handle or video id',
        })
        .option('lang', { type: 'string', default: ENV.defaultLang })
        .option('max-threads', { type: 'number', default: ENV.maxThreads })
        .option('limit', { type: 'number', describe: 'Only consider the first N listed videos' })
        .option('force', {
            type: 'boolean',
            default: false,
            describe: 'Re-index videos that were already attempted',
        })
        .option('verbose', { type: 'boolean', default: false })
        .option('log-file', { type: 'string', describe: 'Also append JSON log lines to this file' })
        .strict()
        .parse();

    if (argv.verbose) setLogLevel('debug');
    if (argv['log-file']) setLogFile(argv['log-file']);

    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.log('\nAborting...');
        controller.abort();
    });

    const url = String(argv.url);
    console.log(`Fetching video urls from ${url}...`);
    const result = await withStore((store) =>
        runIndex(url, argv.lang, {
            store,
            source: new YtDlpMediaSource(),
            maxThreads: argv['max-threads'],
            limit: argv.limit,
            force: argv.force,
            signal: controller.signal,
            onProgress: (p) => {
                process.stdout.write(`\rDownloading subtitles: ${p.done}/${p.total}`);
            },
        })
    );
    if (result.planned > 0) process.stdout.write('\n');

    for (const f of result.failures) {
        console.log(`Error downloading subtitles for ${f.videoId}: ${f.error}`);
    }
    console.log(`\n=== Index Summary ===`);
    console.log(`Listed:       ${result.listed}`);
    console.log(`To index:     ${result.planned}`);
    console.log(`Indexed:      ${result.indexed}`);
    console.log(`Unavailable:  ${result.unavailable}`);
    console.log(`Failed:       ${result.failed}`);
    console.log(`Skipped:      ${result.skipped}`);

    if (result.aborted) {
        process.exitCode = EXIT_ABORTED;
    }
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
