import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { describeError } from '../pipeline/errors';
import { closeLogFile, error, isLogLevel, LOG_LEVELS, setLogFile, setLogLevel } from '../pipeline/log';
import { runLogPath, skipReason, splitRecording, type SplitReport } from '../pipeline/run';
import { fmtTime } from '../pipeline/time';

function printReport(r: SplitReport) {
    if (r.startAdjustment !== undefined) {
        console.log(`Adjusted start time by ${r.startAdjustment.toFixed(2)}s`);
    }
    for (const seg of r.segments) {
        console.log(
            `  ${String(seg.index).padStart(4, '0')}  ${fmtTime(seg.start.toNumber())}  ` +
                `${fmtTime(seg.duration.toNumber())}  ${seg.title}`
        );
    }
    switch (r.status) {
        case 'completed':
            console.log(`Wrote ${r.written.length} tracks to ${r.outDir}`);
            break;
        case 'planned':
            console.log(`Dry run: ${r.segments.length} tracks planned for ${r.outDir}`);
            break;
        case 'aborted':
            for (const m of r.missing) {
                console.log(`  NO SILENCE GAP FOUND near ${fmtTime(m.at)} ${m.title}`);
            }
            break;
    }
    const reason = skipReason(r);
    if (reason) console.log(`WARNING: ${reason.message}`);
}

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .scriptName('wav-split')
        .usage('$0 <files..>\n\nSplit WAV captures into tagged FLAC tracks')
        .option('timestamps', {
            alias: 't',
            type: 'string',
            default: ENV.timestampsFile,
            describe: 'Now-playing timestamp log (NDJSON)',
        })
        .option('ctime-hint', {
            alias: 'c',
            type: 'number',
            describe: 'Unix time the capture started (default: file creation time)',
        })
        .option('out', { type: 'string', default: ENV.outRoot, describe: 'Output root directory' })
        .option('dry-run', { type: 'boolean', default: false, describe: 'Find boundaries without encoding' })
        .option('log-level', { type: 'string', choices: LOG_LEVELS, describe: 'Minimum log level' })
        .demandCommand(1, 'Provide at least one WAV file')
        .help()
        .parse();

    const level = argv['log-level'];
    if (isLogLevel(level)) setLogLevel(level);

    const files = argv._.map(String);
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const stats = { completed: 0, planned: 0, skipped: 0, failed: 0 };
    for (const [i, file] of files.entries()) {
        console.log(`\n=== [${i + 1}/${files.length}] ${file} ===`);
        setLogFile(runLogPath(file));
        try {
            const report = await splitRecording(file, {
                timestampsPath: argv.timestamps,
                ctimeHint: argv['ctime-hint'],
                outRoot: argv.out,
                dryRun: argv['dry-run'],
                signal: controller.signal,
            });
            printReport(report);
            if (report.status === 'completed') stats.completed++;
            else if (report.status === 'planned') stats.planned++;
            else stats.skipped++;
        } catch (e) {
            stats.failed++;
            error('split.fail', { wavPath: file, error: describeError(e) });
            console.error(`${file} failed: ${describeError(e)}`);
        } finally {
            closeLogFile();
        }
        if (controller.signal.aborted) break;
    }

    if (files.length > 1) {
        console.log(`\n=== Summary ===`);
        console.log(`Files:     ${files.length}`);
        console.log(`Completed: ${stats.completed}`);
        console.log(`Planned:   ${stats.planned}`);
        console.log(`Skipped:   ${stats.skipped}`);
        console.log(`Failed:    ${stats.failed}`);
    }
    if (stats.failed) process.exitCode = 1;
    else if (stats.skipped) process.exitCode = 2;
}

main().catch((e) => {
    console.error(e);
    process.exit(1);
});
