import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { FlacEncoder, type Encoder } from './encode';
import {
    AlignmentAmbiguityError,
    type MissingBoundary,
    SilenceNotFoundError,
    type SplitError,
    throwIfCancelled,
} from './errors';
import { info, startStep, warn } from './log';
import { segmentTracks } from './segment';
import type { SilenceOptions } from './silence';
import { fmtTime } from './time';
import { loadTimestampLog } from './timestamps';
import type { SplitStatus, TrackSegment } from './types';
import { openWav } from './wav';

export interface SplitOptions {
    timestampsPath: string;
    /** Unix seconds the capture started; defaults to the file's creation time */
    ctimeHint?: number;
    outRoot?: string;
    /** Segment only; nothing is encoded or written */
    dryRun?: boolean;
    encoder?: Encoder;
    silence?: Omit<SilenceOptions, 'signal'>;
    signal?: AbortSignal;
}

export interface SplitReport {
    wavPath: string;
    status: SplitStatus;
    outDir: string;
    hint: number;
    /** Seconds between the hint and the first playing event */
    startAdjustment?: number;
    durationSec: number;
    segments: TrackSegment[];
    missing: MissingBoundary[];
    written: string[];
}

/** Birth time of the file in unix seconds, or its change time where birth time is unavailable. */
export async function recordingCreatedAt(filePath: string): Promise<number> {
    const st = await fs.stat(filePath);
    const ms = st.birthtimeMs > 0 ? st.birthtimeMs : st.ctimeMs;
    return ms / 1000;
}

export function outputDirFor(outRoot: string, wavPath: string): string {
    return path.resolve(outRoot, path.basename(wavPath, path.extname(wavPath)));
}

export function runLogDirFor(wavPath: string, logsRoot: string = ENV.logsRoot): string {
    return path.resolve(logsRoot, path.basename(wavPath, path.extname(wavPath)));
}

export function runLogPath(wavPath: string, now: number = Date.now()): string {
    return path.join(runLogDirFor(wavPath), `run-${now}.log`);
}

/** Newest run-<ms>.log for a recording, or null when it has none. */
export async function latestRunLog(wavPath: string, logsRoot: string = ENV.logsRoot): Promise<string | null> {
    const dir = runLogDirFor(wavPath, logsRoot);
    if (!(await fs.pathExists(dir))) return null;
    const runs = (await fs.readdir(dir))
        .map((f) => ({ f, m: /^run-(\d+)\.log$/.exec(f) }))
        .filter((x): x is { f: string; m: RegExpExecArray } => x.m !== null)
        .sort((a, b) => Number(b.m[1]) - Number(a.m[1]));
    return runs.length ? path.join(dir, runs[0].f) : null;
}

export function trackFileName(index: number): string {
    return `${String(index).padStart(4, '0')}.flac`;
}

/** Why a run wrote nothing, or null for completed and planned runs. */
export function skipReason(report: SplitReport): SplitError | null {
    switch (report.status) {
        case 'unaligned':
            return new AlignmentAmbiguityError(
                `No "Playing" event at or after ${report.hint}; nothing to encode`,
                report.hint
            );
        case 'aborted':
            return new SilenceNotFoundError(
                `${report.missing.length} track change(s) without a silence gap; skipped encoding`,
                report.missing
            );
        default:
            return null;
    }
}

/**
 * Splits one capture into tagged tracks.
 *
 * Segmentation must succeed for every boundary before the output directory is
 * created. Encoding then runs one track at a time and stops at the first
 * failure; tracks already written stay on disk.
 */
export async function splitRecording(wavPath: string, opts: SplitOptions): Promise<SplitReport> {
    const outDir = outputDirFor(opts.outRoot ?? ENV.outRoot, wavPath);
    const wav = await openWav(wavPath);
    try {
        const durationSec = wav.totalDuration.toNumber();
        info('split.open', { wavPath, ...wav.format, duration: fmtTime(durationSec) });

        const events = await loadTimestampLog(opts.timestampsPath);
        const hint = opts.ctimeHint ?? (await recordingCreatedAt(wavPath));
        const outcome = await segmentTracks(wav, events, hint, {
            threshold: ENV.silenceThreshold,
            lookBackSec: ENV.silenceLookBackSec,
            ...opts.silence,
            signal: opts.signal,
        });
        const report: SplitReport = {
            wavPath,
            status: 'unaligned',
            outDir,
            hint,
            durationSec,
            segments: [],
            missing: [],
            written: [],
        };

        if (outcome.status === 'unaligned') {
            warn('split.unaligned', { wavPath, hint });
            return report;
        }
        report.startAdjustment = outcome.startAdjustment;
        if (outcome.status === 'aborted') {
            warn('split.aborted', { wavPath, missing: outcome.missing.length });
            return { ...report, status: 'aborted', missing: outcome.missing };
        }
        report.segments = outcome.segments;
        if (opts.dryRun) {
            info('split.dryRun', { wavPath, segments: outcome.segments.length });
            return { ...report, status: 'planned' };
        }

        const encoder = opts.encoder ?? new FlacEncoder();
        await fs.ensureDir(outDir);
        const timer = startStep('split.encode', { wavPath, encoder: encoder.name, total: outcome.segments.length });
        for (const seg of outcome.segments) {
            throwIfCancelled(opts.signal);
            const outPath = path.join(outDir, trackFileName(seg.index));
            info('split.encode.track', {
                index: seg.index,
                total: outcome.segments.length,
                start: fmtTime(seg.start.toNumber()),
                duration: fmtTime(seg.duration.toNumber()),
                title: seg.title,
            });
            await encoder.encode({
                pcm: await wav.readRawBytes(seg.start, seg.duration),
                format: wav.format,
                tags: seg.metadata,
                outPath,
                signal: opts.signal,
            });
            report.written.push(outPath);
            timer.eta(report.written.length, outcome.segments.length);
        }
        timer.end();
        return { ...report, status: 'completed' };
    } finally {
        await wav.close();
    }
}
