import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { withStore } from '../db/store';
import { clipFolderFor, extractClips } from '../pipeline/clips';
import { ENV } from '../pipeline/env';
import { YtDlpMediaSource } from '../pipeline/ytdlp';

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .option('text', { type: 'string', demandOption: true, describe: 'Full-text query' })
        .option('user', { type: 'string', describe: 'Only this channel (uploader id, e.g. @user)' })
        .option('lang', { type: 'string' })
        .option('format', { choices: ['table', 'json'] as const, default: 'table' as const })
        .option('download-parts', { type: 'boolean', default: false })
        .option('spacing-secs', { type: 'number', default: ENV.spacingSecs })
        .option('folder', { type: 'string', describe: 'Clip destination (default output-<text>)' })
        .strict()
        .parse();

    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.log('\nAborting...');
        controller.abort();
    });

    const text = argv.text;
    await withStore(async (store) => {
        const results = [...store.search(text, { uploaderId: argv.user, lang: argv.lang })];

        if (!results.length) {
            console.log('No results');
            return;
        }

        if (argv['download-parts']) {
            const folder = argv.folder ?? clipFolderFor(text);
            console.log(`Downloading ${results.length} parts to ${folder}...`);
            const summary = await extractClips(results, {
                source: new YtDlpMediaSource(),
                folder,
                spacingSecs: argv['spacing-secs'],
                signal: controller.signal,
            });
            console.log(
                `Downloaded: ${summary.downloaded}  Already archived: ${summary.skipped}  Failed: ${summary.failed}`
            );
            for (const f of summary.failures) {
                console.log(`  ${f.videoId} ${f.start}-${f.end}: ${f.error}`);
            }
            if (controller.signal.aborted) process.exitCode = 130;
            return;
        }

        if (argv.format === 'json') {
            console.log(JSON.stringify(results, null, 2));
        } else {
            console.table(
                results.map((r) => ({
                    video: r.video_id,
                    channel: r.channel_name,
                    start: r.start_time,
                    text: r.text,
                    link: r.link,
                }))
            );
        }
    });
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
